/**
 * Embedding rebuild status
 *
 * Tracks whether the embedding store has been built so concurrent rebuilds
 * can be refused.
 */

import { EventEmitter } from 'node:events';

export type EmbeddingState = 'not_started' | 'in_progress' | 'complete';

export interface EmbeddingStatusEventMap {
  change: { previous: EmbeddingState; current: EmbeddingState };
}

export type EmbeddingStatusEventName = keyof EmbeddingStatusEventMap;

export class EmbeddingStatus extends EventEmitter {
  private state: EmbeddingState;

  constructor(initial: EmbeddingState = 'not_started') {
    super();
    this.state = initial;
  }

  emit<K extends EmbeddingStatusEventName>(event: K, data: EmbeddingStatusEventMap[K]): boolean {
    return super.emit(event, data);
  }

  on<K extends EmbeddingStatusEventName>(event: K, listener: (data: EmbeddingStatusEventMap[K]) => void): this {
    return super.on(event, listener);
  }

  get current(): EmbeddingState {
    return this.state;
  }

  isInProgress(): boolean {
    return this.state === 'in_progress';
  }

  isComplete(): boolean {
    return this.state === 'complete';
  }

  /**
   * Move to in_progress. Returns false when a rebuild is already running.
   */
  start(): boolean {
    if (this.state === 'in_progress') return false;
    this.transition('in_progress');
    return true;
  }

  complete(): void {
    this.transition('complete');
  }

  reset(): void {
    this.transition('not_started');
  }

  private transition(next: EmbeddingState): void {
    const previous = this.state;
    if (previous === next) return;
    this.state = next;
    this.emit('change', { previous, current: next });
  }
}
