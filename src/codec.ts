import type pino from 'pino';
import type { SessionRecord, SessionRecordPayload, UnknownFieldPolicy } from './types.js';
import type { Config } from './config.js';
import { DecodeError } from './error.js';
import { SESSION_RECORD_FIELDS } from './schema.js';
import { decodeSessionRecord, encodeSessionRecord } from './session-record.js';
import { createLogger } from './logger.js';

export interface SessionRecordCodecOptions {
  unknownFields?: UnknownFieldPolicy;
  logger?: pino.Logger;
}

const KNOWN_FIELDS: ReadonlySet<string> = new Set<string>(SESSION_RECORD_FIELDS);

/**
 * SessionRecord と JSON テキストの相互変換を行うコーデック。
 * ロガーを渡すとデコード失敗時にフィールドパスのみを debug で出力する（トークン値は出力しない）。
 */
export class SessionRecordCodec {
  readonly unknownFields: UnknownFieldPolicy;
  private readonly logger?: pino.Logger;

  constructor(options: SessionRecordCodecOptions = {}) {
    this.unknownFields = options.unknownFields ?? 'strip';
    this.logger = options.logger;
  }

  decode(payload: unknown): SessionRecord {
    let record: SessionRecord;
    try {
      record = decodeSessionRecord(payload, this.unknownFields);
    } catch (err) {
      if (err instanceof DecodeError) {
        this.logger?.debug(
          { issues: err.issues.map((issue) => issue.path) },
          'session record decode failed',
        );
      }
      throw err;
    }

    if (this.logger && typeof payload === 'object' && payload !== null) {
      const ignored = Object.keys(payload).filter((key) => !KNOWN_FIELDS.has(key));
      if (ignored.length > 0) {
        this.logger.debug({ fields: ignored }, 'unknown session record fields ignored');
      }
    }
    return record;
  }

  encode(record: SessionRecord): SessionRecordPayload {
    return encodeSessionRecord(record);
  }

  /** JSON テキストをデコードする。不正な JSON は SyntaxError を cause に持つ DecodeError になる。 */
  parse(text: string): SessionRecord {
    let payload: unknown;
    try {
      payload = JSON.parse(text);
    } catch (err) {
      const cause = err instanceof Error ? err : undefined;
      this.logger?.debug('session record payload is not valid JSON');
      throw new DecodeError('invalid session record: malformed JSON', [], cause);
    }
    return this.decode(payload);
  }

  stringify(record: SessionRecord): string {
    return JSON.stringify(this.encode(record));
  }
}

/** 設定からロガー付きのコーデックを生成する。 */
export function createSessionRecordCodec(config: Config): SessionRecordCodec {
  const logger = createLogger({
    serviceName: config.app.name,
    version: config.app.version,
    environment: config.app.environment,
    logLevel: config.observability.log.level,
    logFormat: config.observability.log.format,
  });
  return new SessionRecordCodec({ unknownFields: config.codec.unknown_fields, logger });
}
