export type { SessionRecord, SessionRecordPayload, UnknownFieldPolicy } from './types.js';
export type { DecodeIssue } from './error.js';
export { DecodeError, ConfigError } from './error.js';
export { SessionRecordPayloadSchema, StrictSessionRecordPayloadSchema } from './schema.js';
export {
  createSessionRecord,
  decodeSessionRecord,
  encodeSessionRecord,
  updateSessionRecord,
  sessionRecordEquals,
  isSessionRecordPayload,
} from './session-record.js';
export { SessionRecordCodec, createSessionRecordCodec, type SessionRecordCodecOptions } from './codec.js';
export { createLogger, buildLoggerOptions, TOKEN_REDACT_PATHS, REDACTED, type LoggerConfig } from './logger.js';
export {
  load,
  validate,
  ConfigSchema,
  AppConfigSchema,
  CodecConfigSchema,
  ObservabilityConfigSchema,
  type Config,
  type AppConfig,
  type CodecConfig,
} from './config.js';
