import ApiEndpoints from './api-endpoints';
import { DEFAULT_REFRESH_INTERVAL_MS, DEFAULT_WAIT_FIRST_RESPONSE } from './constants';
import { validateNotBlank, validatePositiveInteger, validateUrl } from './validation';

export type ToggleClientOptions = {
  /** Path of the toggles snapshot, appended to the remote URL. */
  togglesPath?: string;
  /** Path of the events collector, appended to the remote URL. */
  eventsPath?: string;
  /** Interval between snapshot fetches and event flushes; also bounds every request. */
  refreshIntervalMs?: number;
  /** Whether client initialization waits for the first snapshot fetch to land. */
  waitFirstResponse?: boolean;
};

export interface ToggleClientConfig {
  remoteUrl: string;
  togglesUrl: string;
  eventsUrl: string;
  serverSdkKey: string;
  refreshIntervalMs: number;
  waitFirstResponse: boolean;
  apiEndpoints: ApiEndpoints;
}

/**
 * Applies option defaults and validates the result.
 *
 * @throws ConfigurationError when the remote URL, the SDK key or the refresh interval is malformed
 */
export function buildClientConfig(
  remoteUrl: string,
  serverSdkKey: string,
  options: ToggleClientOptions = {},
): ToggleClientConfig {
  validateNotBlank(remoteUrl, 'Invalid argument: remoteUrl cannot be blank');
  validateNotBlank(serverSdkKey, 'Invalid argument: serverSdkKey cannot be blank');

  const {
    togglesPath,
    eventsPath,
    refreshIntervalMs = DEFAULT_REFRESH_INTERVAL_MS,
    waitFirstResponse = DEFAULT_WAIT_FIRST_RESPONSE,
  } = options;
  validatePositiveInteger(
    refreshIntervalMs,
    'Invalid argument: refreshIntervalMs must be a positive integer',
  );

  const apiEndpoints = new ApiEndpoints({ remoteUrl, togglesPath, eventsPath });
  validateUrl(apiEndpoints.getRemoteUrl(), 'Invalid argument: remoteUrl is not a valid URL');

  return {
    remoteUrl: apiEndpoints.getRemoteUrl(),
    togglesUrl: apiEndpoints.togglesEndpoint().toString(),
    eventsUrl: apiEndpoints.eventsEndpoint().toString(),
    serverSdkKey,
    refreshIntervalMs,
    waitFirstResponse,
    apiEndpoints,
  };
}
