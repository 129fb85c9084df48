import type { RelayHttpClient } from './client.js';
import type { DebugSession, DebugSessionList, RequestOptions } from './types.js';

export class DebugResource {
  constructor(private readonly client: RelayHttpClient) {}

  list(options?: RequestOptions): Promise<DebugSessionList> {
    return this.client.request<DebugSessionList>({ method: 'GET', path: '/debug', options });
  }

  retrieve(debugId: string, options?: RequestOptions): Promise<DebugSession> {
    return this.client.request<DebugSession>({
      method: 'GET',
      path: `/debug/${encodeURIComponent(debugId)}`,
      options,
    });
  }
}
