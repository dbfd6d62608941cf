import { logger, loggerPrefix } from './application-logger';
import ConfigurationRequestor from './configuration-requestor';
import { IToggleStore } from './configuration-store/configuration-store';
import initPoller, { IPoller } from './poller';

export enum SynchronizerState {
  CREATED = 'CREATED',
  RUNNING = 'RUNNING',
  STOPPED = 'STOPPED',
}

/**
 * Keeps the toggle store fresh by fetching the snapshot every `refreshIntervalMs`.
 *
 * Each successful fetch replaces the published repository by reference, so evaluation never
 * takes a lock and never sees a partial update. Stopping aborts the in-flight fetch; the last
 * published repository stays authoritative until `clear()`.
 */
export default class Synchronizer {
  private state = SynchronizerState.CREATED;
  private readonly abortController = new AbortController();
  private readonly poller: IPoller;

  constructor(
    private readonly requestor: ConfigurationRequestor,
    private readonly toggleStore: IToggleStore,
    refreshIntervalMs: number,
  ) {
    this.poller = initPoller(refreshIntervalMs, () => this.fetchSnapshot());
  }

  getState(): SynchronizerState {
    return this.state;
  }

  /**
   * Starts polling. With `waitFirstResponse` the returned promise settles once the first fetch
   * attempt has landed (it is bounded by the request timeout); otherwise it resolves at once
   * and evaluation serves caller defaults until a snapshot arrives.
   */
  async start(waitFirstResponse: boolean): Promise<void> {
    if (this.state !== SynchronizerState.CREATED) {
      return;
    }
    this.state = SynchronizerState.RUNNING;

    const firstFetch = this.poller.start().catch((error) => {
      logger.error(`${loggerPrefix} Unable to start toggle synchronization: ${error}`);
    });
    if (waitFirstResponse) {
      await firstFetch;
      if (!this.isReady()) {
        logger.warn(`${loggerPrefix} First toggle fetch did not succeed; serving defaults`);
      }
    }
  }

  stop(): void {
    if (this.state === SynchronizerState.STOPPED) {
      return;
    }
    this.state = SynchronizerState.STOPPED;
    this.poller.stop();
    this.abortController.abort();
  }

  clear(): void {
    this.toggleStore.clear();
  }

  isReady(): boolean {
    return this.toggleStore.isInitialized();
  }

  private async fetchSnapshot(): Promise<void> {
    const published = await this.requestor.fetchAndStoreToggles(this.abortController.signal);
    if (published) {
      logger.debug(`${loggerPrefix} Published toggle snapshot`);
    }
  }
}
