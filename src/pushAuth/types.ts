import type { AuthorizeResult } from '../auth/errors.js';

export const PUSH_AUTH_NOTE_TYPE = 'push_auth';

export interface AuthorizationRequest {
  token: string;
  title: string;
  message: string;
}

export type AuthorizationRequestField = keyof AuthorizationRequest;

export type ParsedAuthorizationRequest =
  | { ok: true; request: AuthorizationRequest }
  | { ok: false; missing: AuthorizationRequestField[] };

export interface ConfirmationPrompt {
  title: string;
  message: string;
  acceptLabel: string;
  rejectLabel: string;
}

/** Resolves true when the login is approved; false on ignore or dismissal. */
export type PresentPrompt = (prompt: ConfirmationPrompt) => Promise<boolean>;

export type AuthorizeLogin = (token: string) => Promise<AuthorizeResult>;

export type PushAuthOutcome =
  | { status: 'malformed'; missing: AuthorizationRequestField[] }
  | { status: 'ignored' }
  | { status: 'approved'; authorization: AuthorizeResult };
