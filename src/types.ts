/** ログインセッション。構築後は変更できない。 */
export interface SessionRecord {
  readonly sessionToken: string;
  /** 有効期限。形式は規定しない不透明な文字列として扱う。 */
  readonly sessionExpiration: string;
  readonly updateToken: string;
  readonly id: number;
}

/** SessionRecord のシリアライズ形式。キー名はワイヤ上の名前そのまま。 */
export interface SessionRecordPayload {
  session_token: string;
  session_expiration: string;
  update_token: string;
  id: number;
}

/** 未知フィールドの扱い。strip は無視し、reject はデコードエラーにする。 */
export type UnknownFieldPolicy = 'strip' | 'reject';
