import { RelayHttpClient } from './client.js';
import { ConversionsResource } from './conversions.js';
import { DebugResource } from './debug.js';
import { ReportsResource } from './reports.js';
import { SessionsResource } from './sessions.js';
import type { HealthResponse, PortalRelayConfig, RequestOptions } from './types.js';

export class PortalRelay {
  public readonly reports: ReportsResource;
  public readonly conversions: ConversionsResource;
  public readonly sessions: SessionsResource;
  public readonly debug: DebugResource;
  private readonly client: RelayHttpClient;

  constructor(config: PortalRelayConfig = {}) {
    this.client = new RelayHttpClient(config);
    this.reports = new ReportsResource(this.client);
    this.conversions = new ConversionsResource(this.client);
    this.sessions = new SessionsResource(this.client);
    this.debug = new DebugResource(this.client);
  }

  setApiKey(apiKey: string): void {
    this.client.setApiKey(apiKey);
  }

  health(options?: RequestOptions): Promise<HealthResponse> {
    return this.client.request<HealthResponse>({ method: 'GET', path: '/health', options });
  }
}

export { filenameFromDisposition } from './client.js';
export * from './types.js';
export * from './errors.js';
