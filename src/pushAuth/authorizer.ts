import { logInfo, logWarn } from '../logger.js';
import { redactToken } from '../utils.js';
import { parseAuthorizationRequest, readNoteType } from './payload.js';
import {
  PUSH_AUTH_NOTE_TYPE,
  type AuthorizeLogin,
  type PresentPrompt,
  type PushAuthOutcome,
} from './types.js';

interface NotificationAuthorizerOptions {
  presentPrompt: PresentPrompt;
  authorize: AuthorizeLogin;
  acceptLabel?: string;
  rejectLabel?: string;
}

/**
 * A notification is handled only while the app is not in the background (background
 * delivery can hit the same note more than once), no prompt is already on screen,
 * and the note type is `push_auth`.
 */
export function shouldHandleNotification(payload: unknown, appIsForeground: boolean, promptVisible: boolean): boolean {
  const noteType = readNoteType(payload);
  if (noteType === null) {
    return false;
  }
  return appIsForeground && noteType === PUSH_AUTH_NOTE_TYPE && !promptVisible;
}

export class NotificationAuthorizer {
  private readonly presentPrompt: PresentPrompt;
  private readonly authorize: AuthorizeLogin;
  private readonly acceptLabel: string;
  private readonly rejectLabel: string;
  private promptVisible = false;

  constructor(opts: NotificationAuthorizerOptions) {
    this.presentPrompt = opts.presentPrompt;
    this.authorize = opts.authorize;
    this.acceptLabel = opts.acceptLabel ?? 'Approve';
    this.rejectLabel = opts.rejectLabel ?? 'Ignore';
  }

  isPromptVisible(): boolean {
    return this.promptVisible;
  }

  shouldHandle(payload: unknown, appIsForeground: boolean): boolean {
    return shouldHandleNotification(payload, appIsForeground, this.promptVisible);
  }

  /**
   * Asks for confirmation and, once approved, authorizes the login attempt.
   * Callers gate with {@link shouldHandle} first; the note type is not checked again here.
   */
  async handle(payload: unknown): Promise<PushAuthOutcome> {
    const parsed = parseAuthorizationRequest(payload);
    if (!parsed.ok) {
      logWarn(`Dropping push auth notification with missing fields: ${parsed.missing.join(', ')}`);
      return { status: 'malformed', missing: parsed.missing };
    }

    const { token, title, message } = parsed.request;

    this.promptVisible = true;
    let accepted: boolean;
    try {
      accepted = await this.presentPrompt({
        title,
        message,
        acceptLabel: this.acceptLabel,
        rejectLabel: this.rejectLabel,
      });
    } finally {
      this.promptVisible = false;
    }

    if (!accepted) {
      logInfo('Push auth login attempt ignored');
      return { status: 'ignored' };
    }

    logInfo(`Push auth login attempt approved (token ${redactToken(token)})`);
    const authorization = await this.authorize(token);
    return { status: 'approved', authorization };
  }
}
