export type ErrorCode =
  | 'INCOMPLETE_FRAME'
  | 'FRAME_TOO_LARGE'
  | 'PROTOCOL_ERROR'
  | 'CAPACITY_EXCEEDED'
  | 'INVALID_SIGNAL'
  | 'UNSUPPORTED_FORMAT'
  | 'INVALID_STATE'
  | 'INTERNAL_ERROR';

export type Result<T> = { ok: true; value: T } | { ok: false; code: ErrorCode; message: string };

export function ok<T>(value: T): Result<T> {
  return { ok: true, value };
}

export function err<T = never>(code: ErrorCode, message: string): Result<T> {
  return { ok: false, code, message };
}
