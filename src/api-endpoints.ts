import { EVENTS_ENDPOINT, TOGGLES_ENDPOINT } from './constants';

export interface IApiEndpointsParams {
  remoteUrl: string;
  togglesPath?: string;
  eventsPath?: string;
}

/** Utility class for constructing the toggles and events URLs given a remote base URL and optional path overrides */
export default class ApiEndpoints {
  private readonly remoteUrl: string;

  constructor(private readonly params: IApiEndpointsParams) {
    this.remoteUrl = params.remoteUrl.endsWith('/') ? params.remoteUrl : `${params.remoteUrl}/`;
  }

  getRemoteUrl(): string {
    return this.remoteUrl;
  }

  endpoint(resource: string): URL {
    return new URL(this.remoteUrl + resource);
  }

  togglesEndpoint(): URL {
    return this.endpoint(this.params.togglesPath ?? TOGGLES_ENDPOINT);
  }

  eventsEndpoint(): URL {
    return this.endpoint(this.params.eventsPath ?? EVENTS_ENDPOINT);
  }
}
