import type { SessionRecord, SessionRecordPayload, UnknownFieldPolicy } from './types.js';
import { DecodeError, toDecodeIssues } from './error.js';
import { SessionRecordPayloadSchema, StrictSessionRecordPayloadSchema } from './schema.js';

/**
 * SessionRecord を生成する。値の検証は行わない。
 * 返すレコードは凍結済みで、以後フィールドは変更できない。
 */
export function createSessionRecord(
  sessionToken: string,
  sessionExpiration: string,
  updateToken: string,
  id: number,
): SessionRecord {
  return Object.freeze({ sessionToken, sessionExpiration, updateToken, id });
}

/**
 * ペイロードを SessionRecord にデコードする。
 * 必須フィールドの欠落・型不一致・オブジェクト以外の入力は DecodeError を投げる。
 */
export function decodeSessionRecord(
  payload: unknown,
  unknownFields: UnknownFieldPolicy = 'strip',
): SessionRecord {
  const schema =
    unknownFields === 'reject' ? StrictSessionRecordPayloadSchema : SessionRecordPayloadSchema;
  const result = schema.safeParse(payload);
  if (!result.success) {
    const issues = toDecodeIssues(result.error.issues);
    const detail = issues
      .map((issue) => `${issue.path === '' ? '(root)' : issue.path}: ${issue.message}`)
      .join('; ');
    throw new DecodeError(`invalid session record: ${detail}`, issues, result.error);
  }
  const data = result.data;
  return createSessionRecord(data.session_token, data.session_expiration, data.update_token, data.id);
}

/** SessionRecord をシリアライズ形式に変換する。トークンはそのまま出力する。 */
export function encodeSessionRecord(record: SessionRecord): SessionRecordPayload {
  return {
    session_token: record.sessionToken,
    session_expiration: record.sessionExpiration,
    update_token: record.updateToken,
    id: record.id,
  };
}

/** 指定フィールドを差し替えた新しいレコードを返す。元のレコードは変更しない。 */
export function updateSessionRecord(
  record: SessionRecord,
  changes: Partial<SessionRecord>,
): SessionRecord {
  return createSessionRecord(
    changes.sessionToken ?? record.sessionToken,
    changes.sessionExpiration ?? record.sessionExpiration,
    changes.updateToken ?? record.updateToken,
    changes.id ?? record.id,
  );
}

export function sessionRecordEquals(a: SessionRecord, b: SessionRecord): boolean {
  return (
    a.sessionToken === b.sessionToken &&
    a.sessionExpiration === b.sessionExpiration &&
    a.updateToken === b.updateToken &&
    a.id === b.id
  );
}

export function isSessionRecordPayload(value: unknown): value is SessionRecordPayload {
  return SessionRecordPayloadSchema.safeParse(value).success;
}
