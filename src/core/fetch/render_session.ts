/**
 * 🖥️ RENDER SESSIONS
 * Headless Chrome for JavaScript-gated directories. A session is a scoped
 * resource: opened for one site's share of a run and closed when that share ends.
 */

import puppeteer, { Browser } from 'puppeteer-core';

import { Logger } from '../../utils/logger';
import { HttpResponse } from './http_transport';
import { RequestIdentity } from './identity_rotator';

export interface RenderSession {
    render(url: string, identity: RequestIdentity, timeoutMs: number): Promise<HttpResponse>;
    close(): Promise<void>;
}

export interface RenderSessionFactory {
    open(siteId: string): Promise<RenderSession>;
}

const HIDE_WEBDRIVER = `
Object.defineProperty(navigator, 'webdriver', { get: () => false });
window.chrome = window.chrome || { runtime: {} };
Object.defineProperty(navigator, 'languages', { get: () => ['en-US', 'en'] });
`;

const LAUNCH_ARGS = [
    '--no-sandbox',
    '--disable-setuid-sandbox',
    '--disable-dev-shm-usage',
    '--disable-blink-features=AutomationControlled',
    '--window-size=1366,768',
];

class PuppeteerRenderSession implements RenderSession {
    constructor(private readonly siteId: string, private readonly browser: Browser) { }

    async render(url: string, identity: RequestIdentity, timeoutMs: number): Promise<HttpResponse> {
        const page = await this.browser.newPage();
        try {
            const { 'User-Agent': userAgent, ...extraHeaders } = identity.headers;
            if (userAgent) {
                await page.setUserAgent(userAgent);
            }
            await page.setExtraHTTPHeaders(extraHeaders);
            await page.setViewport({ width: 1366, height: 768 });
            await page.evaluateOnNewDocument(HIDE_WEBDRIVER);

            const response = await page.goto(url, { waitUntil: 'networkidle2', timeout: timeoutMs });
            const body = await page.content();
            return { status: response ? response.status() : 200, body };
        } finally {
            await page.close().catch((e: unknown) => {
                Logger.debug('[RenderSession] page close failed', { site_id: this.siteId, error_message: String(e) });
            });
        }
    }

    async close(): Promise<void> {
        await this.browser.close();
        Logger.debug('[RenderSession] closed', { site_id: this.siteId });
    }
}

export class PuppeteerRenderSessionFactory implements RenderSessionFactory {
    constructor(private readonly executablePath: string) { }

    async open(siteId: string): Promise<RenderSession> {
        const browser = await puppeteer.launch({
            executablePath: this.executablePath,
            headless: true,
            args: LAUNCH_ARGS,
        });
        Logger.info('[RenderSession] 🖥️ opened', { site_id: siteId });
        return new PuppeteerRenderSession(siteId, browser);
    }
}
