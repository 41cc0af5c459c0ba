import { errorMessage } from '../providers/provider.js';
import type { SyncEventStatus } from '../types.js';

export type SyncListener = (status: SyncEventStatus, message: string, provider: string) => void | Promise<void>;

/**
 * Status notifications from the sync core. Each listener runs in isolation:
 * a throwing or rejecting listener is logged and the others still receive
 * the event. emit() never throws.
 */
export class SyncEvents {
  private readonly listeners = new Set<SyncListener>();

  /** Register a listener. Returns a function that removes it. */
  subscribe(listener: SyncListener): () => void {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }

  get listenerCount(): number {
    return this.listeners.size;
  }

  emit(status: SyncEventStatus, message: string, provider: string): void {
    for (const listener of [...this.listeners]) {
      try {
        const result = listener(status, message, provider);
        if (result instanceof Promise) {
          result.catch((error: unknown) => {
            console.error(`Sync listener failed on ${status}: ${errorMessage(error)}`);
          });
        }
      } catch (error) {
        console.error(`Sync listener failed on ${status}: ${errorMessage(error)}`);
      }
    }
  }
}
