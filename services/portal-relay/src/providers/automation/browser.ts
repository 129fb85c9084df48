import { chromium, errors, type Browser, type BrowserContext, type Page } from 'playwright-core';
import { writeFile } from 'fs/promises';
import { AutomationError, AutomationTimeoutError, errorMessage, RelayError } from '../../core/errors.js';
import type { Workspace } from '../../core/workspace.js';

export interface BrowserSettings {
  chromiumPath: string;
  headless: boolean;
  pageLoadTimeoutMs: number;
  elementTimeoutMs: number;
  downloadTimeoutMs: number;
  userAgent?: string;
}

const DEFAULT_USER_AGENT =
  'Mozilla/5.0 (X11; Linux x86_64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/120.0.0.0 Safari/537.36';

const CHROMIUM_ARGS = [
  '--no-sandbox',
  '--disable-dev-shm-usage',
  '--disable-gpu',
  '--disable-software-rasterizer',
  '--disable-extensions',
  '--disable-setuid-sandbox',
  '--disable-blink-features=AutomationControlled',
];

/** Open browser context plus the page diagnostics are taken from. */
export interface BrowserSession {
  context: BrowserContext;
  page: Page;
}

export function toAutomationError(error: unknown, step: string): RelayError {
  if (error instanceof RelayError) return error;
  if (error instanceof errors.TimeoutError) {
    return new AutomationTimeoutError(`Timed out during ${step}: ${error.message}`, { step });
  }
  return new AutomationError(`Automation failed during ${step}: ${errorMessage(error)}`, 'AUTOMATION_FAILED', {
    step,
  });
}

/**
 * Bounds a playwright call that takes no timeout of its own. On expiry the
 * work is left to settle in the background; a late failure is only logged.
 */
export async function withinDeadline<T>(work: Promise<T>, timeoutMs: number, step: string): Promise<T> {
  let timer: NodeJS.Timeout | undefined;
  const deadline = new Promise<never>((_, reject) => {
    timer = setTimeout(() => {
      void work.catch((error: unknown) => {
        // eslint-disable-next-line no-console
        console.warn(`[portal-relay] ${step} failed after its deadline error=${errorMessage(error)}`);
      });
      reject(new AutomationTimeoutError(`Timed out during ${step} after ${timeoutMs}ms`, { step }));
    }, timeoutMs);
  });
  try {
    return await Promise.race([work, deadline]);
  } finally {
    clearTimeout(timer);
  }
}

async function captureDiagnostics(page: Page, workspace: Workspace, label: string): Promise<void> {
  try {
    await page.screenshot({ path: workspace.diagnosticPath(`${label}_error_screenshot.png`), fullPage: true });
  } catch (error) {
    // eslint-disable-next-line no-console
    console.warn(`[portal-relay] screenshot capture failed workspace_id=${workspace.id} error=${errorMessage(error)}`);
  }

  try {
    const html = await page.content();
    await writeFile(workspace.diagnosticPath(`${label}_page_source.html`), html, 'utf8');
  } catch (error) {
    // eslint-disable-next-line no-console
    console.warn(`[portal-relay] page source capture failed workspace_id=${workspace.id} error=${errorMessage(error)}`);
  }
}

/**
 * Runs `flow` in a fresh headless Chromium whose downloads land in the
 * workspace. On failure a screenshot and the page source of the session's
 * current page are written as workspace diagnostics before the browser
 * closes. The browser is closed on every path.
 */
export async function withBrowserSession<T>(
  settings: BrowserSettings,
  workspace: Workspace,
  label: string,
  flow: (session: BrowserSession, step: (name: string) => void) => Promise<T>,
): Promise<T> {
  let currentStep = 'browser launch';
  const step = (name: string) => {
    currentStep = name;
    // eslint-disable-next-line no-console
    console.log(`[portal-relay] ${label} workspace_id=${workspace.id} step=${name}`);
  };

  let browser: Browser;
  try {
    browser = await chromium.launch({
      headless: settings.headless,
      executablePath: settings.chromiumPath || undefined,
      args: CHROMIUM_ARGS,
      downloadsPath: workspace.dir,
      timeout: settings.pageLoadTimeoutMs,
    });
  } catch (error) {
    throw toAutomationError(error, currentStep);
  }

  let session: BrowserSession | undefined;
  try {
    const context = await browser.newContext({
      acceptDownloads: true,
      viewport: { width: 1920, height: 1080 },
      userAgent: settings.userAgent ?? DEFAULT_USER_AGENT,
    });
    context.setDefaultTimeout(settings.elementTimeoutMs);
    context.setDefaultNavigationTimeout(settings.pageLoadTimeoutMs);
    session = { context, page: await context.newPage() };

    return await flow(session, step);
  } catch (error) {
    if (session) {
      await captureDiagnostics(session.page, workspace, label);
    }
    throw toAutomationError(error, currentStep);
  } finally {
    try {
      await browser.close();
    } catch (error) {
      // eslint-disable-next-line no-console
      console.warn(`[portal-relay] ${label} browser close failed error=${errorMessage(error)}`);
    }
  }
}
