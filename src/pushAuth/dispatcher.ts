import type { AppStateTracker } from '../app/appState.js';
import { logDebug, logError, logInfo, logWarn } from '../logger.js';
import type { NotificationAuthorizer } from './authorizer.js';
import { readNoteType } from './payload.js';
import { PUSH_AUTH_NOTE_TYPE, type PushAuthOutcome } from './types.js';

export type DispatchSkipReason = 'not_push_auth' | 'background' | 'prompt_visible';

export type DispatchResult = { handled: true } | { handled: false; reason: DispatchSkipReason };

interface PushNotificationDispatcherDeps {
  authorizer: Pick<NotificationAuthorizer, 'shouldHandle' | 'handle'>;
  appState: Pick<AppStateTracker, 'isForeground'>;
}

export class PushNotificationDispatcher {
  private readonly deps: PushNotificationDispatcherDeps;
  private readonly inFlight = new Set<Promise<void>>();

  constructor(deps: PushNotificationDispatcherDeps) {
    this.deps = deps;
  }

  dispatch(payload: unknown): DispatchResult {
    const foreground = this.deps.appState.isForeground();
    if (!this.deps.authorizer.shouldHandle(payload, foreground)) {
      const reason = this.skipReason(payload, foreground);
      logDebug(`Skipping notification (${reason})`);
      return { handled: false, reason };
    }

    const task = this.deps.authorizer
      .handle(payload)
      .then((outcome) => this.logOutcome(outcome))
      .catch((error: unknown) => {
        logError('Push auth handling failed', error);
      })
      .finally(() => {
        this.inFlight.delete(task);
      });
    this.inFlight.add(task);

    return { handled: true };
  }

  async idle(): Promise<void> {
    while (this.inFlight.size > 0) {
      await Promise.all([...this.inFlight]);
    }
  }

  private skipReason(payload: unknown, foreground: boolean): DispatchSkipReason {
    if (readNoteType(payload) !== PUSH_AUTH_NOTE_TYPE) {
      return 'not_push_auth';
    }
    if (!foreground) {
      return 'background';
    }
    return 'prompt_visible';
  }

  private logOutcome(outcome: PushAuthOutcome): void {
    switch (outcome.status) {
      case 'malformed':
        return;
      case 'ignored':
        return;
      case 'approved':
        if (outcome.authorization.ok) {
          logInfo('Login authorized');
        } else {
          logWarn(`Login authorization not confirmed (${outcome.authorization.error.code})`);
        }
        return;
    }
  }
}
