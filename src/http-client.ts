import { PackedData } from './access-event';
import ApiEndpoints from './api-endpoints';
import { decodeRepository } from './decoding';
import { Repository } from './interfaces';
import { USER_AGENT } from './version';

export class HttpRequestError extends Error {
  constructor(public message: string, public status: number, public cause?: Error) {
    super(message);
    this.name = 'HttpRequestError';
    if (cause) {
      this.cause = cause;
    }
  }
}

export interface IHttpClient {
  getToggles(signal?: AbortSignal): Promise<Repository | null>;
  postEvents(payload: PackedData, signal?: AbortSignal): Promise<void>;
  rawGet(url: URL, signal?: AbortSignal): Promise<unknown>;
  rawPost(url: URL, body: unknown, signal?: AbortSignal): Promise<void>;
}

export default class FetchHttpClient implements IHttpClient {
  constructor(
    private readonly apiEndpoints: ApiEndpoints,
    private readonly serverSdkKey: string,
    private readonly timeout: number,
  ) {}

  async getToggles(signal?: AbortSignal): Promise<Repository | null> {
    const url = this.apiEndpoints.togglesEndpoint();
    return decodeRepository(await this.rawGet(url, signal));
  }

  async postEvents(payload: PackedData, signal?: AbortSignal): Promise<void> {
    const url = this.apiEndpoints.eventsEndpoint();
    await this.rawPost(url, payload, signal);
  }

  async rawGet(url: URL, signal?: AbortSignal): Promise<unknown> {
    return await this.request(url, 'GET', (response) => response.json(), undefined, signal);
  }

  async rawPost(url: URL, body: unknown, signal?: AbortSignal): Promise<void> {
    await this.request(url, 'POST', (response) => response.text(), JSON.stringify(body), signal);
  }

  private async request<T>(
    url: URL,
    method: 'GET' | 'POST',
    readBody: (response: Response) => Promise<T>,
    body?: string,
    signal?: AbortSignal,
  ): Promise<T> {
    // Abortable fetch: the request, body included, is interrupted when it takes longer than the
    // timeout budget, or when the caller's signal is aborted.
    const controller = new AbortController();
    let timedOut = false;
    const timeoutId = setTimeout(() => {
      timedOut = true;
      controller.abort();
    }, this.timeout);
    const onCallerAbort = () => controller.abort();
    if (signal?.aborted) {
      controller.abort();
    } else {
      signal?.addEventListener('abort', onCallerAbort, { once: true });
    }

    const headers: Record<string, string> = {
      Authorization: this.serverSdkKey,
      'User-Agent': USER_AGENT,
    };
    if (body !== undefined) {
      headers['Content-Type'] = 'application/json';
    }

    try {
      const response = await fetch(url.toString(), {
        method,
        headers,
        body,
        signal: controller.signal,
      });

      if (!response.ok) {
        throw new HttpRequestError('Failed to fetch data', response.status);
      }
      return await untilAborted(readBody(response), controller.signal);
    } catch (error) {
      if (error instanceof HttpRequestError) {
        throw error;
      }
      const cause = error instanceof Error ? error : undefined;
      if (cause?.name === 'AbortError') {
        throw timedOut
          ? new HttpRequestError('Request timed out', 408, cause)
          : new HttpRequestError('Request cancelled', 0, cause);
      }
      throw new HttpRequestError('Network error', 0, cause);
    } finally {
      // Clear timeout when the body is read within the budget.
      clearTimeout(timeoutId);
      signal?.removeEventListener('abort', onCallerAbort);
    }
  }
}

// Settles with `promise`, or rejects with an AbortError as soon as `signal` aborts.
function untilAborted<T>(promise: Promise<T>, signal: AbortSignal): Promise<T> {
  return new Promise<T>((resolve, reject) => {
    const onAbort = () => {
      const abortError = new Error('This operation was aborted');
      abortError.name = 'AbortError';
      reject(abortError);
    };
    if (signal.aborted) {
      onAbort();
      return;
    }
    signal.addEventListener('abort', onAbort, { once: true });
    promise.then(
      (value) => {
        signal.removeEventListener('abort', onAbort);
        resolve(value);
      },
      (error) => {
        signal.removeEventListener('abort', onAbort);
        reject(error);
      },
    );
  });
}
