import { z } from 'zod';
import { isRecord } from '../utils.js';
import type { AuthorizationRequestField, ParsedAuthorizationRequest } from './types.js';

const rawText = z.unknown().transform((value) => (typeof value === 'string' ? value : ''));
const textField = rawText.transform((value) => value.trim());

const pushAuthPayloadSchema = z.object({
  // Opaque credential: forwarded exactly as delivered.
  push_auth_token: rawText,
  title: textField,
  aps: z.unknown().transform((value) => (isRecord(value) ? value.alert : undefined)).pipe(textField),
});

export function readNoteType(payload: unknown): string | null {
  if (!isRecord(payload)) {
    return null;
  }
  return typeof payload.type === 'string' ? payload.type : null;
}

/**
 * Extracts the login token, prompt title and alert message from a push payload.
 * Every field must be a non-empty string; anything else is reported as missing.
 */
export function parseAuthorizationRequest(payload: unknown): ParsedAuthorizationRequest {
  const parsed = pushAuthPayloadSchema.safeParse(payload);
  if (!parsed.success) {
    return { ok: false, missing: ['token', 'title', 'message'] };
  }

  const { push_auth_token: token, title, aps: message } = parsed.data;

  const missing: AuthorizationRequestField[] = [];
  if (token.trim().length === 0) {
    missing.push('token');
  }
  if (title.length === 0) {
    missing.push('title');
  }
  if (message.length === 0) {
    missing.push('message');
  }
  if (missing.length > 0) {
    return { ok: false, missing };
  }

  return { ok: true, request: { token, title, message } };
}
