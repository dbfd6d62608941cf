import { IToggleStore } from './configuration-store/configuration-store';
import { IHttpClient } from './http-client';

// Requests AND stores the toggle snapshot
export default class ConfigurationRequestor {
  constructor(
    private readonly httpClient: IHttpClient,
    private readonly toggleStore: IToggleStore,
  ) {}

  /**
   * Fetches the current snapshot and publishes it into the store.
   *
   * A response without toggles leaves the published snapshot untouched, as does a failed or
   * cancelled request (the error is rethrown for the caller to log and retry).
   *
   * @returns whether a new snapshot was published
   */
  async fetchAndStoreToggles(signal?: AbortSignal): Promise<boolean> {
    const repository = await this.httpClient.getToggles(signal);
    if (!repository || signal?.aborted) {
      return false;
    }
    this.toggleStore.setRepository(repository);
    return true;
  }
}
