import { z } from 'zod';
import { logError, logInfo } from '../logger.js';
import { getErrorMessage, isRecord, redactToken } from '../utils.js';
import { AuthError, type AuthorizeResult } from './errors.js';

interface PushAuthClientConfig {
  apiBase: string;
  bearerToken: string;
  requestTimeoutMs?: number;
}

const authorizeResponseSchema = z.union([
  z.boolean().transform((success) => ({ success })),
  z
    .object({
      success: z.boolean().optional(),
    })
    .passthrough(),
]);

export class PushAuthClient {
  private static readonly DEFAULT_REQUEST_TIMEOUT_MS = 10_000;
  private static readonly AUTHORIZE_PATH = '/me/two-step/push-authentication';

  private readonly apiBase: string;
  private readonly bearerToken: string;
  private readonly requestTimeoutMs: number;

  constructor(config: PushAuthClientConfig) {
    this.apiBase = config.apiBase.replace(/\/+$/, '');
    this.bearerToken = config.bearerToken;
    this.requestTimeoutMs = Math.max(100, config.requestTimeoutMs ?? PushAuthClient.DEFAULT_REQUEST_TIMEOUT_MS);
  }

  /**
   * Confirms the login attempt identified by `token`. Failures are logged here and
   * returned as a result; nothing is retried.
   */
  async authorizeLogin(token: string): Promise<AuthorizeResult> {
    try {
      await this.postAuthorize(token);
      logInfo(`Push auth token ${redactToken(token)} authorized`);
      return { ok: true };
    } catch (error) {
      const authError =
        error instanceof AuthError
          ? error
          : new AuthError('network', `Push auth request failed: ${getErrorMessage(error)}`, { cause: error });
      logError(`Push auth authorization failed for token ${redactToken(token)}`, authError.message);
      return { ok: false, error: authError };
    }
  }

  private async postAuthorize(token: string): Promise<void> {
    const response = await this.fetchWithTimeout(`${this.apiBase}${PushAuthClient.AUTHORIZE_PATH}`, {
      method: 'POST',
      headers: {
        authorization: `Bearer ${this.bearerToken}`,
        'content-type': 'application/json',
      },
      body: JSON.stringify({
        action: 'authorize_login',
        push_token: token,
      }),
    });

    if (!response.ok) {
      const body = await response.text();
      throw new AuthError('http', `Push auth request failed: ${response.status} ${body}`, {
        status: response.status,
      });
    }

    let raw: unknown;
    try {
      raw = await response.json();
    } catch (error) {
      throw new AuthError('invalid_response', 'Push auth response was not JSON', { cause: error });
    }

    const parsed = authorizeResponseSchema.safeParse(raw);
    if (!parsed.success) {
      throw new AuthError('invalid_response', `Unexpected push auth response: ${parsed.error.message}`);
    }
    if (parsed.data.success === false) {
      throw new AuthError('invalid_response', 'Push auth request was not accepted');
    }
  }

  private async fetchWithTimeout(url: string, init: RequestInit): Promise<Response> {
    const controller = new AbortController();
    const timeoutId = setTimeout(() => controller.abort(), this.requestTimeoutMs);
    try {
      return await fetch(url, {
        ...init,
        signal: controller.signal,
      });
    } catch (error) {
      if (this.isAbortError(error)) {
        throw new AuthError('timeout', `Push auth request timed out after ${this.requestTimeoutMs}ms`, {
          cause: error,
        });
      }
      throw error;
    } finally {
      clearTimeout(timeoutId);
    }
  }

  private isAbortError(error: unknown): boolean {
    return isRecord(error) && error.name === 'AbortError';
  }
}
