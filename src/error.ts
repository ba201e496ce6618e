import type { ZodIssue } from 'zod';

export interface DecodeIssue {
  /** ドット区切りのフィールドパス。ペイロード自体の場合は空文字。 */
  path: string;
  code: string;
  message: string;
}

export function toDecodeIssues(issues: readonly ZodIssue[]): DecodeIssue[] {
  return issues.map((issue) => ({
    path: issue.path.map(String).join('.'),
    code: issue.code,
    message: issue.message,
  }));
}

/** セッションペイロードのデコードエラー。 */
export class DecodeError extends Error {
  constructor(
    message: string,
    public readonly issues: readonly DecodeIssue[] = [],
    cause?: Error,
  ) {
    super(message, { cause });
    this.name = 'DecodeError';
  }
}

/** 設定ファイルのバリデーションエラー。 */
export class ConfigError extends Error {
  constructor(
    message: string,
    public readonly issues: readonly DecodeIssue[] = [],
  ) {
    super(message);
    this.name = 'ConfigError';
  }
}
