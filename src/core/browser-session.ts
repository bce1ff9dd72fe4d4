import { Browser, BrowserContext, LaunchOptions, Page, chromium } from 'playwright-core';
import { AuthExpiredError, NetworkError, errorMessage } from '../errors.js';
import { logger } from '../logger.js';
import { SearchQuery, formatQueryName } from '../types.js';
import { Credentials, Session, SessionFactory } from '../types/session.js';
import { SiteProfile } from '../types/site-profile.js';

const USER_AGENTS = [
    'Mozilla/5.0 (Windows NT 10.0; Win64; x64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/120.0.0.0 Safari/537.36',
    'Mozilla/5.0 (Macintosh; Intel Mac OS X 10_15_7) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/120.0.0.0 Safari/537.36',
    'Mozilla/5.0 (Windows NT 10.0; Win64; x64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/119.0.0.0 Safari/537.36 Edg/119.0.0.0',
    'Mozilla/5.0 (Macintosh; Intel Mac OS X 10_15_7) AppleWebKit/605.1.15 (KHTML, like Gecko) Version/17.0 Safari/605.1.15'
];

const VIEWPORT_SIZES = [
    { width: 1920, height: 1080 },
    { width: 1366, height: 768 },
    { width: 1536, height: 864 },
    { width: 1440, height: 900 }
];

const LAUNCH_ATTEMPTS = 3;

export interface BrowserSessionOptions {
    headless?: boolean;
    executablePath?: string;
    channel?: string;
    minDelayMs?: number;
    maxDelayMs?: number;
    navigationTimeoutMs?: number;
}

/** MM/DD/YYYY, the format the search form's date picker expects. */
export function formatFormDate(date: Date): string {
    const mm = String(date.getMonth() + 1).padStart(2, '0');
    const dd = String(date.getDate()).padStart(2, '0');
    return `${mm}/${dd}/${date.getFullYear()}`;
}

export function lookbackStartDate(now: Date, lookbackDays: number): string {
    const start = new Date(now.getFullYear(), now.getMonth(), now.getDate() - lookbackDays);
    return formatFormDate(start);
}

function asNavigationError(error: unknown): unknown {
    const message = errorMessage(error);
    return message.includes('net::') ? new NetworkError(message) : error;
}

function randomBetween(min: number, max: number): number {
    return min + Math.random() * Math.max(0, max - min);
}

export class BrowserSession implements Session {
    public readonly id: string;
    private context: BrowserContext;
    private page: Page;
    private profile: SiteProfile;
    private navigationTimeoutMs: number;

    constructor(id: string, context: BrowserContext, page: Page, profile: SiteProfile, navigationTimeoutMs: number) {
        this.id = id;
        this.context = context;
        this.page = page;
        this.profile = profile;
        this.navigationTimeoutMs = navigationTimeoutMs;
    }

    public async submitSearch(query: SearchQuery, signal: AbortSignal): Promise<void> {
        const { selectors } = this.profile;

        if (!(await this.page.$(selectors.lastName))) {
            await this.goto(this.profile.searchUrl);
        }
        signal.throwIfAborted();
        await this.ensureAuthenticated();

        await this.page.fill(selectors.firstName, query.firstName);
        await this.page.fill(selectors.lastName, query.lastName);

        if (selectors.startDate) {
            const startDate = lookbackStartDate(new Date(), this.profile.lookbackDays);
            // The date picker ignores typed input, so the value is set directly.
            await this.page.$eval(selectors.startDate, (element, value) => {
                if (element instanceof HTMLInputElement) {
                    element.value = value;
                    element.dispatchEvent(new Event('change', { bubbles: true }));
                }
            }, startDate);
            logger.debug(`Start date set to ${startDate} for ${formatQueryName(query)}`, 'session');
        }
        signal.throwIfAborted();

        await this.page.click(selectors.searchButton);
    }

    public async waitForResults(signal: AbortSignal): Promise<string> {
        const { results, noResults, loginForm } = this.profile.selectors;
        const ready = [results, noResults, loginForm].filter((selector): selector is string => Boolean(selector));

        try {
            await this.page.waitForSelector(ready.join(', '), { timeout: this.navigationTimeoutMs });
        } catch (error) {
            // Some result pages never render the container; the parser decides.
            logger.debug(`Results container not found, using page source: ${errorMessage(error)}`, 'session');
        }
        signal.throwIfAborted();
        await this.ensureAuthenticated();

        return this.page.content();
    }

    public async close(): Promise<void> {
        await this.context.close();
    }

    private async goto(url: string): Promise<void> {
        try {
            await this.page.goto(url, { waitUntil: 'domcontentloaded', timeout: this.navigationTimeoutMs });
        } catch (error) {
            throw asNavigationError(error);
        }
    }

    private async ensureAuthenticated(): Promise<void> {
        if (await this.page.$(this.profile.selectors.loginForm)) {
            throw new AuthExpiredError(`Session ${this.id} was logged out by the portal`);
        }
    }
}

/**
 * Opens logged-in sessions against the portal. All sessions share one
 * Chromium process; each gets its own BrowserContext so cookies never mix.
 */
export class BrowserSessionFactory implements SessionFactory {
    private browser: Browser | null = null;
    private launching: Promise<Browser> | null = null;
    private credentials: Credentials;
    private profile: SiteProfile;
    private options: Required<Omit<BrowserSessionOptions, 'executablePath' | 'channel'>> & Pick<BrowserSessionOptions, 'executablePath' | 'channel'>;
    private sequence = 0;

    constructor(credentials: Credentials, profile: SiteProfile, options: BrowserSessionOptions = {}) {
        this.credentials = credentials;
        this.profile = profile;
        this.options = {
            headless: options.headless ?? true,
            executablePath: options.executablePath,
            channel: options.channel,
            minDelayMs: options.minDelayMs ?? 2000,
            maxDelayMs: options.maxDelayMs ?? 5000,
            navigationTimeoutMs: options.navigationTimeoutMs || 60000
        };
    }

    public async create(): Promise<Session> {
        const browser = await this.ensureBrowser();
        const slot = this.sequence++;
        const id = `session_${Date.now()}_${slot + 1}`;

        const context = await browser.newContext({
            userAgent: USER_AGENTS[slot % USER_AGENTS.length],
            viewport: VIEWPORT_SIZES[slot % VIEWPORT_SIZES.length]
        });

        try {
            const page = await context.newPage();
            // Spread logins out so the portal does not see a burst.
            await new Promise(resolve => setTimeout(resolve, randomBetween(this.options.minDelayMs, this.options.maxDelayMs)));
            await this.login(page, id);
            return new BrowserSession(id, context, page, this.profile, this.options.navigationTimeoutMs);
        } catch (error) {
            await context.close();
            throw error;
        }
    }

    public async close(): Promise<void> {
        if (this.browser) {
            await this.browser.close();
            this.browser = null;
            logger.info('Browser closed', 'session');
        }
    }

    private async login(page: Page, id: string): Promise<void> {
        const { selectors } = this.profile;
        try {
            await page.goto(this.profile.loginUrl, { waitUntil: 'domcontentloaded', timeout: this.options.navigationTimeoutMs });
        } catch (error) {
            throw asNavigationError(error);
        }

        await page.fill(selectors.username, this.credentials.username);
        await page.fill(selectors.password, this.credentials.password);
        await page.press(selectors.password, 'Enter');

        try {
            await page.waitForSelector(selectors.lastName, { timeout: this.options.navigationTimeoutMs });
        } catch (error) {
            throw new AuthExpiredError(`Login failed for ${id}: ${errorMessage(error)}`);
        }
        logger.info(`Login successful for ${id}`, 'session');
    }

    private ensureBrowser(): Promise<Browser> {
        if (this.browser) {
            return Promise.resolve(this.browser);
        }
        if (!this.launching) {
            this.launching = this.launch().finally(() => {
                this.launching = null;
            });
        }
        return this.launching;
    }

    private async launch(): Promise<Browser> {
        const launchOptions: LaunchOptions = {
            headless: this.options.headless,
            args: ['--disable-gpu', '--no-sandbox', '--disable-dev-shm-usage']
        };
        if (this.options.executablePath) {
            launchOptions.executablePath = this.options.executablePath;
        } else if (this.options.channel) {
            launchOptions.channel = this.options.channel;
        }

        let lastError: unknown;
        for (let attempt = 1; attempt <= LAUNCH_ATTEMPTS; attempt++) {
            try {
                logger.info(`Launching browser... (attempt ${attempt}/${LAUNCH_ATTEMPTS})`, 'session');
                const browser = await chromium.launch(launchOptions);
                this.browser = browser;
                return browser;
            } catch (error) {
                lastError = error;
                if (attempt < LAUNCH_ATTEMPTS) {
                    const delay = 2000 * Math.pow(2, attempt - 1);
                    logger.warn(`Browser launch failed: ${errorMessage(error)}, retrying in ${delay / 1000}s`, 'session');
                    await new Promise(resolve => setTimeout(resolve, delay));
                }
            }
        }
        throw new Error(`Failed to launch browser after ${LAUNCH_ATTEMPTS} attempts: ${errorMessage(lastError)}`);
    }
}
