/**
 * Progress bus for workflow runs.
 * Event emitter keyed by run id; the WebSocket layer and tests subscribe here.
 */

import { EventEmitter } from 'events';
import type { ProgressEvent, RunStatus, WorkflowFailure } from '../services/workflow/types';

export type RunMessage =
  | { type: 'progress'; runId: string; event: ProgressEvent }
  | {
      type: 'finished';
      runId: string;
      status: RunStatus;
      error: WorkflowFailure | null;
    };

export class ProgressBus extends EventEmitter {
  constructor() {
    super();
    // One listener per open socket; a busy service can exceed the default of 10.
    this.setMaxListeners(0);
  }

  publishProgress(event: ProgressEvent): void {
    this.publish({ type: 'progress', runId: event.runId, event });
  }

  publishFinished(runId: string, status: RunStatus, error: WorkflowFailure | null): void {
    this.publish({ type: 'finished', runId, status, error });
  }

  /**
   * Subscribe to one run's messages. Returns the unsubscribe function.
   */
  subscribeToRun(runId: string, handler: (message: RunMessage) => void): () => void {
    this.on(`run:${runId}`, handler);
    return () => {
      this.off(`run:${runId}`, handler);
    };
  }

  subscribeToAll(handler: (message: RunMessage) => void): () => void {
    this.on('run', handler);
    return () => {
      this.off('run', handler);
    };
  }

  private publish(message: RunMessage): void {
    this.emit(`run:${message.runId}`, message);
    this.emit('run', message);
  }
}
