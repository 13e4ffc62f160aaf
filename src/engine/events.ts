/**
 * Per-session event channel
 *
 * Listeners receive events as they are emitted. The channel also keeps the
 * session's history so `stream()` can replay everything from the start.
 */

import type { Logger } from '../utils/logger.js';
import { isFinalEvent, type ResearchEvent, type ResearchEventListener } from './types.js';

export class SessionEvents {
  private readonly listeners = new Set<ResearchEventListener>();
  private readonly history: ResearchEvent[] = [];

  constructor(private readonly logger: Logger) {}

  /** Events emitted so far, oldest first */
  get emitted(): readonly ResearchEvent[] {
    return this.history;
  }

  emit(event: ResearchEvent): void {
    this.history.push(event);
    for (const listener of [...this.listeners]) {
      try {
        listener(event);
      } catch (error) {
        // A broken subscriber must not stop the session
        const message = error instanceof Error ? error.message : String(error);
        this.logger.warn(`events: ${event.type} listener failed: ${message}`);
      }
    }
  }

  /**
   * @returns unsubscribe function
   */
  subscribe(listener: ResearchEventListener): () => void {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }

  /**
   * Replay the history, then follow live events. Ends after Finalized,
   * Failed or Cancelled.
   */
  async *stream(): AsyncGenerator<ResearchEvent, void, undefined> {
    const queue: ResearchEvent[] = [...this.history];
    let wake: (() => void) | null = null;
    const unsubscribe = this.subscribe((event) => {
      queue.push(event);
      const resolve = wake;
      wake = null;
      resolve?.();
    });

    try {
      for (;;) {
        const event = queue.shift();
        if (event === undefined) {
          await new Promise<void>((resolve) => {
            wake = resolve;
          });
          continue;
        }
        yield event;
        if (isFinalEvent(event)) {
          return;
        }
      }
    } finally {
      unsubscribe();
    }
  }
}
