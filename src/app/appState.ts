import { logInfo } from '../logger.js';

export type AppState = 'active' | 'inactive' | 'background';

export class AppStateTracker {
  private state: AppState;

  constructor(initial: AppState = 'active') {
    this.state = initial;
  }

  getState(): AppState {
    return this.state;
  }

  setState(next: AppState): void {
    if (next === this.state) {
      return;
    }
    logInfo(`App state ${this.state} -> ${next}`);
    this.state = next;
  }

  // Inactive still counts: the app is on screen, just not receiving input.
  isForeground(): boolean {
    return this.state !== 'background';
  }
}
