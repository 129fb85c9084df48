import type { RelayHttpClient } from './client.js';
import type { RequestOptions, VollnaCookiesRequest, VollnaCookiesResponse } from './types.js';

export class SessionsResource {
  constructor(private readonly client: RelayHttpClient) {}

  /** Logs in with the given account and returns the browser cookies as one header string. */
  vollnaCookies(params: VollnaCookiesRequest, options?: RequestOptions): Promise<VollnaCookiesResponse> {
    return this.client.request<VollnaCookiesResponse>({
      method: 'GET',
      path: '/get-vollna-cookies',
      query: {
        email: params.email,
        password: params.password,
        final_url: params.final_url,
      },
      options,
    });
  }
}
