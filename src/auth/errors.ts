export type AuthErrorCode = 'timeout' | 'network' | 'http' | 'invalid_response';

export class AuthError extends Error {
  readonly code: AuthErrorCode;
  readonly status: number | null;

  constructor(code: AuthErrorCode, message: string, options: { status?: number; cause?: unknown } = {}) {
    super(message, { cause: options.cause });
    this.name = 'AuthError';
    this.code = code;
    this.status = options.status ?? null;
  }
}

export type AuthorizeResult = { ok: true } | { ok: false; error: AuthError };
