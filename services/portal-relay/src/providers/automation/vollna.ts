import type { Workspace } from '../../core/workspace.js';
import type { BrowserCookie, CookieAutomation, CookieRequest } from '../../types/automation.js';
import { AutomationError } from '../../core/errors.js';
import { withBrowserSession, type BrowserSettings } from './browser.js';

const VOLLNA_USER_AGENT =
  'Mozilla/5.0 (Windows NT 10.0; Win64; x64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/143.0.0.0 Safari/537.36';

/** Logs in to Vollna, visits the requested page and reads the session cookies. */
export class VollnaCookieAutomation implements CookieAutomation {
  readonly name = 'vollna';

  constructor(
    private readonly settings: BrowserSettings,
    private readonly baseUrl: string,
  ) {}

  extractCookies(request: CookieRequest, workspace: Workspace): Promise<BrowserCookie[]> {
    const settings = { ...this.settings, userAgent: VOLLNA_USER_AGENT };

    return withBrowserSession(settings, workspace, 'cookies', async ({ context, page }, step) => {
      step('login');
      await page.goto(`${this.baseUrl}/login`, { waitUntil: 'domcontentloaded' });
      await page.locator("input[name='email']").fill(request.email);
      await page.locator("input[name='password']").fill(request.password);

      const csrf = await page.locator("input[name='_csrf_token']").count();
      // eslint-disable-next-line no-console
      console.log(`[portal-relay] cookies workspace_id=${workspace.id} csrf_token_present=${csrf > 0}`);

      await page.locator("button[type='submit']").first().click();
      await page.waitForLoadState('domcontentloaded');
      if (new URL(page.url()).pathname.startsWith('/login')) {
        await page.waitForURL((url) => !url.pathname.startsWith('/login')).catch(() => {
          throw new AutomationError('Login rejected by Vollna', 'LOGIN_FAILED');
        });
      }

      step('final url');
      await page.goto(request.finalUrl, { waitUntil: 'domcontentloaded' });

      step('cookies');
      const cookies = await context.cookies();
      // eslint-disable-next-line no-console
      console.log(
        `[portal-relay] cookies workspace_id=${workspace.id} count=${cookies.length} names=${cookies
          .slice(0, 5)
          .map((cookie) => cookie.name)
          .join(',')}`,
      );

      return cookies.map((cookie) => ({
        name: cookie.name,
        value: cookie.value,
        domain: cookie.domain,
        path: cookie.path,
      }));
    });
  }
}
