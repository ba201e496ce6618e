import pino from 'pino';
import { trace } from '@opentelemetry/api';

/** createLogger の設定。 */
export interface LoggerConfig {
  serviceName: string;
  version: string;
  environment: string;
  logLevel: string;
  logFormat: 'json' | 'text';
}

/** ログ出力時に伏せ字にするトークンのパス。ワイヤ形式とメモリ上の両方の名前を対象とする。 */
export const TOKEN_REDACT_PATHS: readonly string[] = [
  'session_token',
  'update_token',
  'sessionToken',
  'updateToken',
  '*.session_token',
  '*.update_token',
  '*.sessionToken',
  '*.updateToken',
];

export const REDACTED = '[REDACTED]';

/**
 * セッション向けの pino オプションを組み立てる。
 * トークンは伏せ字にし、アクティブな OpenTelemetry スパンがあれば trace_id / span_id を付与する。
 */
export function buildLoggerOptions(cfg: LoggerConfig): pino.LoggerOptions {
  return {
    level: cfg.logLevel,
    base: {
      service: cfg.serviceName,
      version: cfg.version,
      environment: cfg.environment,
    },
    redact: { paths: [...TOKEN_REDACT_PATHS], censor: REDACTED },
    mixin() {
      const span = trace.getActiveSpan();
      if (!span) {
        return {};
      }
      const { traceId, spanId } = span.spanContext();
      return { trace_id: traceId, span_id: spanId };
    },
  };
}

/** text 形式では pino-pretty トランスポートを通す。 */
export function createLogger(cfg: LoggerConfig): pino.Logger {
  const options = buildLoggerOptions(cfg);
  if (cfg.logFormat === 'text') {
    options.transport = {
      target: 'pino-pretty',
      options: { colorize: true, translateTime: 'SYS:standard' },
    };
  }
  return pino(options);
}
