import logger from '../../utils/logger';
import { ProgressBus } from '../../utils/progressBus';
import { ProgressEvent, ProgressSink } from './types';

export const loggerProgressSink: ProgressSink = (event) => {
  logger.info(`[${event.step}/${event.totalSteps}] ${event.label}`, {
    runId: event.runId,
    node: event.node,
  });
};

export function busProgressSink(bus: ProgressBus): ProgressSink {
  return (event) => bus.publishProgress(event);
}

export function collectingSink(events: ProgressEvent[]): ProgressSink {
  return (event) => {
    events.push(event);
  };
}

/** Fan out to several sinks; one failing sink does not stop the others. */
export function combineSinks(...sinks: ProgressSink[]): ProgressSink {
  return (event) => {
    for (const sink of sinks) {
      try {
        sink(event);
      } catch (error) {
        logger.warn('Progress sink failed', {
          runId: event.runId,
          error: error instanceof Error ? error.message : String(error),
        });
      }
    }
  };
}
