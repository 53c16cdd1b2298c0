import { createInterface, type Interface } from 'node:readline';
import type { Readable, Writable } from 'node:stream';
import { logDebug } from '../logger.js';
import type { ConfirmationPrompt } from '../pushAuth/types.js';

interface TerminalPromptOptions {
  input: Readable;
  output: Writable;
}

interface PendingPrompt {
  acceptLabel: string;
  armed: boolean;
  resolve: (accepted: boolean) => void;
}

const ACCEPT_ANSWERS = new Set(['a', 'approve', 'y', 'yes']);

export function isAcceptAnswer(answer: string, acceptLabel: string): boolean {
  const normalized = answer.trim().toLowerCase();
  if (normalized.length === 0) {
    return false;
  }
  return ACCEPT_ANSWERS.has(normalized) || normalized === acceptLabel.trim().toLowerCase();
}

/**
 * Presents confirmation prompts on a line-based terminal. Only lines read after a
 * prompt is written count as its answer; input with no prompt waiting is dropped.
 * Closing the input or calling {@link dismiss} while a prompt is open resolves it
 * as not approved.
 */
export class TerminalPromptPresenter {
  private readonly rl: Interface;
  private readonly output: Writable;
  private pending: PendingPrompt | null = null;
  private closed = false;

  constructor(opts: TerminalPromptOptions) {
    this.output = opts.output;
    this.rl = createInterface({ input: opts.input, terminal: false });
    this.rl.on('line', (line) => this.onLine(line));
    this.rl.once('close', () => {
      this.closed = true;
      this.settle(false);
    });
  }

  present(prompt: ConfirmationPrompt): Promise<boolean> {
    if (this.closed) {
      return Promise.resolve(false);
    }
    this.settle(false);

    return new Promise<boolean>((resolve) => {
      const pending: PendingPrompt = { acceptLabel: prompt.acceptLabel, armed: false, resolve };
      this.pending = pending;
      this.output.write(`\n${prompt.title}\n${prompt.message}\n[a] ${prompt.acceptLabel} / [i] ${prompt.rejectLabel}: `);
      // Input already queued when the prompt was written is flushed before this runs.
      setImmediate(() => {
        pending.armed = true;
      });
    });
  }

  dismiss(): void {
    this.settle(false);
  }

  close(): void {
    if (this.closed) {
      return;
    }
    this.rl.close();
  }

  private onLine(line: string): void {
    const pending = this.pending;
    if (!pending || !pending.armed) {
      logDebug('Dropping terminal input with no prompt waiting');
      return;
    }
    this.settle(isAcceptAnswer(line, pending.acceptLabel));
  }

  private settle(accepted: boolean): void {
    const pending = this.pending;
    if (!pending) {
      return;
    }
    this.pending = null;
    pending.resolve(accepted);
  }
}
