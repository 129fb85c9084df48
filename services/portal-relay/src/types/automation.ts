import type { Workspace } from '../core/workspace.js';

export interface ReportRequest {
  companyCode: string;
  username: string;
  password: string;
  /** `YYYY-MM-DD`, already validated. */
  reportDate: string;
}

export interface CookieRequest {
  email: string;
  password: string;
  finalUrl: string;
}

export interface BrowserCookie {
  name: string;
  value: string;
  domain?: string;
  path?: string;
}

export interface ReportAutomation {
  readonly name: string;
  /** Resolves to the path of the downloaded spreadsheet inside the workspace. */
  generateReport(request: ReportRequest, workspace: Workspace): Promise<string>;
}

export interface CookieAutomation {
  readonly name: string;
  extractCookies(request: CookieRequest, workspace: Workspace): Promise<BrowserCookie[]>;
}
