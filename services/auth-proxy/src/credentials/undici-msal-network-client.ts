import type { INetworkModule, NetworkRequestOptions, NetworkResponse } from '@azure/msal-node';
import { type Dispatcher, fetch as undiciFetch } from 'undici';

/** Routes MSAL's discovery and token requests through our own undici dispatcher. */
export class UndiciMsalNetworkClient implements INetworkModule {
  public constructor(private readonly dispatcher: Dispatcher) {}

  public async sendGetRequestAsync<T>(
    url: string,
    options?: NetworkRequestOptions,
  ): Promise<NetworkResponse<T>> {
    return this.send<T>(url, 'GET', options);
  }

  public async sendPostRequestAsync<T>(
    url: string,
    options?: NetworkRequestOptions,
  ): Promise<NetworkResponse<T>> {
    return this.send<T>(url, 'POST', options);
  }

  private async send<T>(
    url: string,
    method: 'GET' | 'POST',
    options?: NetworkRequestOptions,
  ): Promise<NetworkResponse<T>> {
    const response = await undiciFetch(url, {
      method,
      headers: options?.headers,
      body: method === 'POST' ? options?.body : undefined,
      dispatcher: this.dispatcher,
    });

    const text = await response.text();
    let body: T;
    try {
      body = text ? JSON.parse(text) : {};
    } catch (error) {
      throw new Error(`Token endpoint answered ${response.status} with a non-JSON body`, {
        cause: error,
      });
    }

    return {
      headers: Object.fromEntries(response.headers.entries()),
      body,
      status: response.status,
    };
  }
}
