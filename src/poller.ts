import { logger, loggerPrefix } from './application-logger';
import { POLL_JITTER_PCT } from './constants';
import { errorMessage } from './util';

export interface IPoller {
  start: () => Promise<void>;
  stop: () => void;
  isStopped: () => boolean;
}

/**
 * Runs `callback` once on `start()`, then every `intervalMs` until stopped. A failed poll is
 * logged and retried on the next cycle; polling never gives up on its own.
 */
export default function initPoller(intervalMs: number, callback: () => Promise<unknown>): IPoller {
  let stopped = false;
  let previousPollFailed = false;
  let nextTimer: NodeJS.Timeout | undefined = undefined;

  const schedule = (delayMs: number) => {
    if (stopped) {
      return;
    }
    nextTimer = setTimeout(() => void poll(), delayMs);
    // a background refresh never keeps the process alive on its own
    nextTimer.unref();
  };

  const start = async () => {
    stopped = false;
    try {
      await callback();
      previousPollFailed = false;
      logger.info(`${loggerPrefix} Successfully requested initial toggles`);
    } catch (pollingError) {
      previousPollFailed = true;
      logger.warn(
        `${loggerPrefix} Encountered an error with initial poll of toggles: ${errorMessage(
          pollingError,
        )}`,
      );
    }

    if (!stopped) {
      logger.info(`${loggerPrefix} Polling for toggle updates every ${intervalMs} ms`);
      schedule(intervalMs);
    }
  };

  const stop = () => {
    if (!stopped) {
      stopped = true;
      if (nextTimer) {
        clearTimeout(nextTimer);
        nextTimer = undefined;
      }
      logger.info(`${loggerPrefix} Polling stopped`);
    }
  };

  async function poll() {
    if (stopped) {
      return;
    }

    let nextPollMs = intervalMs;
    try {
      await callback();
      if (previousPollFailed) {
        previousPollFailed = false;
        logger.info(`${loggerPrefix} Poll successful; resuming normal polling`);
      }
    } catch (error) {
      if (stopped) {
        return;
      }
      previousPollFailed = true;
      nextPollMs = intervalMs + randomJitterMs(intervalMs);
      logger.warn(
        `${loggerPrefix} Encountered an error polling toggles: ${errorMessage(
          error,
        )}; retrying in ${nextPollMs} ms`,
      );
    }

    schedule(nextPollMs);
  }

  return {
    start,
    stop,
    isStopped: () => stopped,
  };
}

/**
 * Compute a random jitter as a percentage of the polling interval.
 * Will be (5%,10%) of the interval assuming POLL_JITTER_PCT = 0.1
 */
export function randomJitterMs(intervalMs: number) {
  const halfPossibleJitter = (intervalMs * POLL_JITTER_PCT) / 2;
  // at least 1ms, so the total always exceeds half the budget
  const randomOtherHalfJitter = Math.max(
    Math.floor((Math.random() * intervalMs * POLL_JITTER_PCT) / 2),
    1,
  );
  return halfPossibleJitter + randomOtherHalfJitter;
}
