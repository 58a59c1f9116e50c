/**
 * MSE Messages — where non-fatal notices go.
 */

import type { Message, MessageSeverity, MessageSink } from './types.js';

/** Collects messages until someone drains them. */
export class MessageQueue implements MessageSink {
  private readonly pending: Message[] = [];

  queueMessage(severity: MessageSeverity, text: string): void {
    this.pending.push({ severity, text });
  }

  /** Messages queued so far, oldest first. */
  get messages(): readonly Message[] {
    return this.pending;
  }

  /** Remove and return every queued message. */
  drain(): Message[] {
    return this.pending.splice(0, this.pending.length);
  }
}

/** Prints messages as they arrive. */
export const consoleMessages: MessageSink = {
  queueMessage(severity, text) {
    if (severity === 'info') {
      console.log(text);
    } else if (severity === 'warning') {
      console.warn(`Warning: ${text}`);
    } else {
      console.error(`Error: ${text}`);
    }
  },
};
