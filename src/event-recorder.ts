import { AccessEvent, buildPackedData } from './access-event';
import { logger, loggerPrefix } from './application-logger';
import { IHttpClient } from './http-client';
import { errorMessage } from './util';

export enum RecorderState {
  CREATED = 'CREATED',
  RUNNING = 'RUNNING',
  STOPPED = 'STOPPED',
}

/**
 * Collects access events and periodically ships them, aggregated, to the events endpoint.
 *
 * `record` only appends to the pending list. Every `flushIntervalMs` the list is swapped for an
 * empty one and the drained events are delivered as a single document. Delivery is best effort:
 * a failed batch is logged and dropped, never retried or re-queued.
 */
export default class EventRecorder {
  private state = RecorderState.CREATED;
  private pendingEvents: AccessEvent[] = [];
  private flushTimer?: NodeJS.Timeout;
  private finalFlush?: Promise<void>;

  constructor(
    private readonly httpClient: IHttpClient,
    private readonly flushIntervalMs: number,
  ) {}

  getState(): RecorderState {
    return this.state;
  }

  pendingCount(): number {
    return this.pendingEvents.length;
  }

  record(event: AccessEvent): void {
    if (this.state === RecorderState.STOPPED) {
      logger.debug(`${loggerPrefix} Recorder stopped; dropping access event for ${event.key}`);
      return;
    }
    this.pendingEvents.push(event);
  }

  start(): void {
    if (this.state !== RecorderState.CREATED) {
      return;
    }
    this.state = RecorderState.RUNNING;
    this.flushTimer = setInterval(() => void this.flush(), this.flushIntervalMs);
    // pending telemetry never keeps the process alive on its own
    this.flushTimer.unref();
  }

  /**
   * Drains the pending events and delivers them. Resolves once the delivery attempt has
   * completed, failed or timed out; never rejects.
   */
  async flush(): Promise<void> {
    const events = this.pendingEvents;
    this.pendingEvents = [];
    if (!events.length) {
      return;
    }

    try {
      await this.httpClient.postEvents(buildPackedData(events));
    } catch (error) {
      logger.warn(
        `${loggerPrefix} Report event fails, dropping ${events.length} events: ${errorMessage(
          error,
        )}`,
      );
    }
  }

  /**
   * Stops the periodic flush and runs exactly one final flush of whatever is pending. Every call
   * returns the same promise, which resolves when that final flush attempt is over.
   */
  stop(): Promise<void> {
    if (!this.finalFlush) {
      this.state = RecorderState.STOPPED;
      if (this.flushTimer) {
        clearInterval(this.flushTimer);
        this.flushTimer = undefined;
      }
      this.finalFlush = this.flush();
    }
    return this.finalFlush;
  }
}
