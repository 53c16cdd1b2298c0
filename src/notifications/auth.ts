import { timingSafeEqual } from 'node:crypto';
import type { IncomingHttpHeaders } from 'node:http';

export interface DeliveryAuthInput {
  headers: IncomingHttpHeaders;
  secret: string;
}

export interface DeliveryAuthResult {
  authorized: boolean;
  reasonCode: 'bearer_matched' | 'secret_header_matched' | 'secret_not_configured' | 'missing_auth' | 'mismatch';
}

export function authorizeDelivery(input: DeliveryAuthInput): DeliveryAuthResult {
  const secret = input.secret.trim();
  if (secret.length === 0) {
    return { authorized: false, reasonCode: 'secret_not_configured' };
  }

  const authHeader = headerValue(input.headers, 'authorization');
  const secretHeader = headerValue(input.headers, 'x-push-secret');
  if (!authHeader && !secretHeader) {
    return { authorized: false, reasonCode: 'missing_auth' };
  }

  if (authHeader) {
    const token = authHeader.replace(/^bearer\s+/i, '').trim();
    if (secureEqual(token, secret)) {
      return { authorized: true, reasonCode: 'bearer_matched' };
    }
  }

  if (secretHeader && secureEqual(secretHeader, secret)) {
    return { authorized: true, reasonCode: 'secret_header_matched' };
  }

  return { authorized: false, reasonCode: 'mismatch' };
}

export function headerValue(headers: IncomingHttpHeaders, name: string): string | null {
  const value = headers[name];
  if (typeof value === 'string' && value.trim().length > 0) {
    return value.trim();
  }
  if (Array.isArray(value) && value.length > 0 && value[0] && value[0].trim().length > 0) {
    return value[0].trim();
  }
  return null;
}

function secureEqual(a: string, b: string): boolean {
  const left = Buffer.from(a, 'utf8');
  const right = Buffer.from(b, 'utf8');
  if (left.length !== right.length) {
    return false;
  }
  return timingSafeEqual(left, right);
}
