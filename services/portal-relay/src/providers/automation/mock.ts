import { randomBytes } from 'crypto';
import { writeFile } from 'fs/promises';
import type { Workspace } from '../../core/workspace.js';
import type {
  BrowserCookie,
  CookieAutomation,
  CookieRequest,
  ReportAutomation,
  ReportRequest,
} from '../../types/automation.js';

function buildFakeSpreadsheet(request: ReportRequest): Buffer {
  const seed = `${Date.now()}-${randomBytes(8).toString('hex')}`;
  return Buffer.from(`FAKE_XLSX_DATA::${seed}::${request.companyCode}::${request.reportDate}`, 'utf8');
}

function simulatedLatency(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

export class MockReportAutomation implements ReportAutomation {
  readonly name = 'mock';

  constructor(private readonly latencyMs = 300) {}

  async generateReport(request: ReportRequest, workspace: Workspace): Promise<string> {
    await simulatedLatency(this.latencyMs);
    const path = workspace.path(`mock_report_${request.reportDate}.xlsx`);
    await writeFile(path, buildFakeSpreadsheet(request));
    return path;
  }
}

export class MockCookieAutomation implements CookieAutomation {
  readonly name = 'mock';

  constructor(private readonly latencyMs = 300) {}

  async extractCookies(request: CookieRequest): Promise<BrowserCookie[]> {
    await simulatedLatency(this.latencyMs);
    const host = new URL(request.finalUrl).hostname;
    return [
      { name: 'session', value: randomBytes(12).toString('hex'), domain: host, path: '/' },
      { name: 'remember_me', value: '1', domain: host, path: '/' },
    ];
  }
}
