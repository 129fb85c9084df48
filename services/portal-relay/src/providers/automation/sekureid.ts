import type { Page } from 'playwright-core';
import type { Workspace } from '../../core/workspace.js';
import { AutomationError } from '../../core/errors.js';
import type { ReportAutomation, ReportRequest } from '../../types/automation.js';
import { withBrowserSession, withinDeadline, type BrowserSession, type BrowserSettings } from './browser.js';

const SPREADSHEET_NAME = 'attendance_report.xlsx';

// Runs in the report viewer page.
const EXPORT_LINK_SCRIPT = `(() => {
  const links = Array.from(document.querySelectorAll('a[onclick*="exportReport"]'));
  const excel = links.find((link) => link.title === 'Excel' || link.innerText.includes('Excel'));
  if (excel) {
    excel.click();
    return true;
  }
  if (typeof window.$find === 'function' && window.$find('ReportViewer1')) {
    window.$find('ReportViewer1').exportReport('EXCELOPENXML');
    return true;
  }
  return false;
})()`;

async function login(page: Page, baseUrl: string, request: ReportRequest): Promise<void> {
  await page.goto(`${baseUrl}/`, { waitUntil: 'domcontentloaded' });
  await page.locator('#Company_code').fill(request.companyCode);
  await page.locator('#Username').fill(request.username);
  await page.locator('#pass').fill(request.password);
  await page.locator('#Login').click();
  await page.waitForURL((url) => !url.pathname.toLowerCase().includes('login') && url.pathname !== '/', {
    waitUntil: 'domcontentloaded',
  }).catch(async () => {
    if (await page.locator('#Login').isVisible()) {
      throw new AutomationError('Login rejected by Sekure-ID', 'LOGIN_FAILED');
    }
  });
}

async function openReportViewer(session: BrowserSession, baseUrl: string, reportDate: string): Promise<Page> {
  const { page, context } = session;
  await page.goto(`${baseUrl}/DailyReports`, { waitUntil: 'domcontentloaded' });

  const dateField = page.locator('#Date');
  await dateField.fill(reportDate);

  const viewButton = page.getByRole('button', { name: /view|report/i }).first();
  const submit = (await viewButton.count()) > 0 ? viewButton : page.locator("button[type='submit']").first();

  const [viewer] = await Promise.all([
    context.waitForEvent('page').catch(() => undefined),
    submit.click(),
  ]);
  return viewer ?? page;
}

async function triggerExcelExport(viewer: Page): Promise<void> {
  const byText = viewer.getByRole('link', { name: 'Excel', exact: true });
  if ((await byText.count()) > 0) {
    await byText.first().click();
    return;
  }

  const byPartialText = viewer.getByRole('link', { name: /excel/i });
  if ((await byPartialText.count()) > 0) {
    await byPartialText.first().click();
    return;
  }

  const exported = await viewer.evaluate(EXPORT_LINK_SCRIPT);
  if (exported !== true) {
    throw new AutomationError('Could not find or click Excel export control', 'EXPORT_CONTROL_MISSING');
  }
}

/**
 * Sekure-ID Cloud daily attendance report: log in, submit the daily report
 * form, export the report viewer's output as Excel.
 */
export class SekureIdReportAutomation implements ReportAutomation {
  readonly name = 'sekure-id';

  constructor(
    private readonly settings: BrowserSettings,
    private readonly baseUrl: string,
  ) {}

  generateReport(request: ReportRequest, workspace: Workspace): Promise<string> {
    return withBrowserSession(this.settings, workspace, 'report', async (session, step) => {
      step('login');
      await login(session.page, this.baseUrl, request);

      step('report form');
      const viewer = await openReportViewer(session, this.baseUrl, request.reportDate);
      session.page = viewer;
      await viewer.waitForLoadState('domcontentloaded');

      step('excel export');
      const [file] = await Promise.all([
        viewer.waitForEvent('download', { timeout: this.settings.downloadTimeoutMs }),
        triggerExcelExport(viewer),
      ]);

      step('download');
      const target = workspace.path(SPREADSHEET_NAME);
      const saved = (async () => {
        const failure = await file.failure();
        if (failure) {
          throw new AutomationError(`Report download failed: ${failure}`, 'DOWNLOAD_INCOMPLETE');
        }
        await file.saveAs(target);
        return target;
      })();
      return withinDeadline(saved, this.settings.downloadTimeoutMs, 'download');
    });
  }
}
