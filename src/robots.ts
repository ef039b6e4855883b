/**
 * robots.txt compliance helper.
 *
 * Fetches and caches robots.txt for each host the client talks to (one fetch
 * per host for the lifetime of a RobotsPolicy). Uses the `robots-parser`
 * package to evaluate allow/disallow rules and crawl-delay directives.
 */

// Local type for the parsed robots instance (mirrors robots-parser's Robot interface)
interface RobotsInstance {
    isAllowed(url: string, ua?: string): boolean | undefined;
    isDisallowed(url: string, ua?: string): boolean | undefined;
    getCrawlDelay(ua?: string): number | undefined;
    getSitemaps(): string[];
}

import { createRequire } from 'module';
const require = createRequire(import.meta.url);
const robotsParser: (url: string, content: string) => RobotsInstance = require('robots-parser');

export interface RobotsPolicyOptions {
    fetch: typeof fetch;
    userAgent: string;
    /** Lower bound for the delay between two requests to one host */
    minDelayMs: number;
    timeoutMs: number;
}

export class RobotsPolicy {
    // hostname → parsed robots instance (null = fetch failed / robots.txt missing)
    private readonly robotsCache = new Map<string, RobotsInstance | null>();
    // hostname → crawl delay (ms)
    private readonly delayCache = new Map<string, number>();

    constructor(private readonly options: RobotsPolicyOptions) { }

    /**
     * Returns true if the URL may be fetched according to robots.txt.
     * If robots.txt cannot be fetched, defaults to allowing the URL.
     */
    async isAllowed(url: string): Promise<boolean> {
        const robots = await this.getRobots(url);
        if (!robots) return true;
        return robots.isAllowed(url, this.options.userAgent) !== false;
    }

    /** Delay to keep between two requests to the URL's host, in ms. */
    async crawlDelayFor(url: string): Promise<number> {
        await this.getRobots(url);
        return this.delayCache.get(new URL(url).hostname) ?? this.options.minDelayMs;
    }

    clear(): void {
        this.robotsCache.clear();
        this.delayCache.clear();
    }

    private async getRobots(url: string): Promise<RobotsInstance | null> {
        const { hostname, origin } = new URL(url);
        if (this.robotsCache.has(hostname)) {
            return this.robotsCache.get(hostname) ?? null;
        }

        const robotsUrl = `${origin}/robots.txt`;
        const { minDelayMs, userAgent } = this.options;
        try {
            const res = await this.options.fetch(robotsUrl, {
                headers: { 'User-Agent': userAgent },
                signal: AbortSignal.timeout(this.options.timeoutMs),
            });
            if (!res.ok) {
                this.robotsCache.set(hostname, null);
                this.delayCache.set(hostname, minDelayMs);
                return null;
            }
            const robots = robotsParser(robotsUrl, await res.text());
            this.robotsCache.set(hostname, robots);

            // Crawl-delay for our user agent or wildcard, in seconds
            const crawlDelay = robots.getCrawlDelay(userAgent) ?? robots.getCrawlDelay('*') ?? 0;
            this.delayCache.set(hostname, Math.max(crawlDelay * 1000, minDelayMs));
            return robots;
        } catch (err) {
            // Unreachable robots.txt is treated as "allow all"
            process.stderr.write(`[robots] Could not read ${robotsUrl}: ${err}\n`);
            this.robotsCache.set(hostname, null);
            this.delayCache.set(hostname, minDelayMs);
            return null;
        }
    }
}
