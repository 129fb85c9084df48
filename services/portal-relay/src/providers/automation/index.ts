import { config } from '../../config.js';
import type { CookieAutomation, ReportAutomation } from '../../types/automation.js';
import type { BrowserSettings } from './browser.js';
import { MockCookieAutomation, MockReportAutomation } from './mock.js';
import { SekureIdReportAutomation } from './sekureid.js';
import { VollnaCookieAutomation } from './vollna.js';

export interface AutomationProviders {
  reports: ReportAutomation;
  cookies: CookieAutomation;
}

export function createAutomationProviders(): AutomationProviders {
  if (config.automationProvider === 'mock') {
    return { reports: new MockReportAutomation(), cookies: new MockCookieAutomation() };
  }

  const settings: BrowserSettings = {
    chromiumPath: config.chromiumPath,
    headless: config.browserHeadless,
    pageLoadTimeoutMs: config.pageLoadTimeoutMs,
    elementTimeoutMs: config.elementTimeoutMs,
    downloadTimeoutMs: config.downloadTimeoutMs,
  };

  return {
    reports: new SekureIdReportAutomation(settings, config.sekureIdBaseUrl),
    cookies: new VollnaCookieAutomation(settings, config.vollnaBaseUrl),
  };
}
