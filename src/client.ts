/**
 * HTTP client for documentation pages.
 *
 * One DocsClient is created per scrape invocation and passed to the scraper;
 * it owns the robots.txt cache and the per-host request timestamps, and
 * `close()` drops both when the invocation ends.
 */

import { RobotsPolicy } from './robots.js';

export const USER_AGENT = 'docs2uitk/1.0';
const DEFAULT_CRAWL_DELAY_MS = 500;
const DEFAULT_TIMEOUT_MS = 30_000;

export class FetchError extends Error {
    constructor(
        message: string,
        readonly url: string,
        readonly status?: number,
        options?: ErrorOptions,
    ) {
        super(message, options);
        this.name = 'FetchError';
    }
}

export interface DocsClientOptions {
    userAgent?: string;
    /** Minimum delay between two requests to the same host */
    crawlDelayMs?: number;
    timeoutMs?: number;
    /** Check robots.txt before each request (default true) */
    respectRobots?: boolean;
    /** Fetch implementation, defaults to the global fetch */
    fetch?: typeof fetch;
}

export class DocsClient {
    private readonly userAgent: string;
    private readonly crawlDelayMs: number;
    private readonly timeoutMs: number;
    private readonly respectRobots: boolean;
    private readonly fetchImpl: typeof fetch;
    private readonly robots: RobotsPolicy;
    // hostname → timestamp of the last request
    private readonly lastRequestTime = new Map<string, number>();

    constructor(options: DocsClientOptions = {}) {
        this.userAgent = options.userAgent ?? USER_AGENT;
        this.crawlDelayMs = options.crawlDelayMs ?? DEFAULT_CRAWL_DELAY_MS;
        this.timeoutMs = options.timeoutMs ?? DEFAULT_TIMEOUT_MS;
        this.respectRobots = options.respectRobots ?? true;
        this.fetchImpl = options.fetch ?? fetch;
        this.robots = new RobotsPolicy({
            fetch: this.fetchImpl,
            userAgent: this.userAgent,
            minDelayMs: this.crawlDelayMs,
            timeoutMs: Math.min(this.timeoutMs, 5_000),
        });
    }

    /**
     * GETs a page and returns its body.
     * Throws FetchError on network failure, timeout, non-2xx status or when
     * robots.txt disallows the URL.
     */
    async fetchHtml(url: string): Promise<string> {
        if (this.respectRobots && !(await this.robots.isAllowed(url))) {
            throw new FetchError(`robots.txt disallows ${url}`, url);
        }
        await this.enforceCrawlDelay(url);

        let res: Response;
        try {
            res = await this.fetchImpl(url, {
                headers: { 'User-Agent': this.userAgent, Accept: 'text/html' },
                signal: AbortSignal.timeout(this.timeoutMs),
            });
        } catch (err) {
            const reason = err instanceof Error ? err.message : String(err);
            throw new FetchError(`Request for ${url} failed: ${reason}`, url, undefined, { cause: err });
        }

        if (!res.ok) {
            throw new FetchError(`HTTP ${res.status} for ${url}`, url, res.status);
        }
        process.stderr.write(`[client] ✓ ${url} (${res.status})\n`);
        return res.text();
    }

    close(): void {
        this.robots.clear();
        this.lastRequestTime.clear();
    }

    private async enforceCrawlDelay(url: string): Promise<void> {
        const { hostname } = new URL(url);
        const delay = this.respectRobots ? await this.robots.crawlDelayFor(url) : this.crawlDelayMs;
        const last = this.lastRequestTime.get(hostname);
        if (last !== undefined) {
            const elapsed = Date.now() - last;
            if (elapsed < delay) await sleep(delay - elapsed);
        }
        this.lastRequestTime.set(hostname, Date.now());
    }
}

function sleep(ms: number): Promise<void> {
    return new Promise(resolve => setTimeout(resolve, ms));
}
