/**
 * Test: DocsClient and robots.txt compliance
 *
 * Verifies request headers, error reporting, allow/disallow rules and that
 * robots.txt is read once per host until the client is closed. Every response
 * comes from a fake fetch.
 */

import { DocsClient, FetchError, USER_AGENT } from '../src/client.js';
import assert from 'node:assert/strict';

console.log('Running client tests...\n');

interface Recorded {
    url: string;
    userAgent: string | null;
}

function fakeSite(routes: Record<string, { status: number; body: string }>) {
    const requests: Recorded[] = [];
    const fetchImpl = async (input: string | URL | Request, init?: RequestInit): Promise<Response> => {
        const url = typeof input === 'string' ? input : input instanceof URL ? input.href : input.url;
        requests.push({ url, userAgent: new Headers(init?.headers).get('User-Agent') });
        const route = routes[url] ?? { status: 404, body: 'not found' };
        return new Response(route.body, { status: route.status });
    };
    return { requests, fetchImpl };
}

const ROBOTS = 'User-agent: *\nDisallow: /private/\n';

// ── Test 1: body and User-Agent ──────────────────────────────────────────────
{
    const site = fakeSite({ 'https://docs.test/page': { status: 200, body: '<h1>Hi</h1>' } });
    const client = new DocsClient({ respectRobots: false, crawlDelayMs: 0, fetch: site.fetchImpl });

    assert.equal(await client.fetchHtml('https://docs.test/page'), '<h1>Hi</h1>');
    assert.deepEqual(site.requests, [{ url: 'https://docs.test/page', userAgent: USER_AGENT }]);
    console.log('✓ Test 1 passed: page body returned with our User-Agent');
}

// ── Test 2: HTTP errors carry the status ─────────────────────────────────────
{
    const site = fakeSite({});
    const client = new DocsClient({ respectRobots: false, crawlDelayMs: 0, fetch: site.fetchImpl });

    await assert.rejects(client.fetchHtml('https://docs.test/missing'), (err: unknown) => {
        assert.ok(err instanceof FetchError);
        assert.equal(err.status, 404);
        assert.equal(err.url, 'https://docs.test/missing');
        assert.equal(err.message, 'HTTP 404 for https://docs.test/missing');
        return true;
    });
    console.log('✓ Test 2 passed: non-2xx response');
}

// ── Test 3: network errors are wrapped ───────────────────────────────────────
{
    const boom = new Error('connection reset');
    const client = new DocsClient({
        respectRobots: false,
        crawlDelayMs: 0,
        fetch: async () => {
            throw boom;
        },
    });

    await assert.rejects(client.fetchHtml('https://docs.test/page'), (err: unknown) => {
        assert.ok(err instanceof FetchError);
        assert.equal(err.status, undefined);
        assert.equal(err.message, 'Request for https://docs.test/page failed: connection reset');
        assert.equal(err.cause, boom);
        return true;
    });
    console.log('✓ Test 3 passed: network failure');
}

// ── Test 4: robots.txt rules ─────────────────────────────────────────────────
{
    const site = fakeSite({
        'https://docs.test/robots.txt': { status: 200, body: ROBOTS },
        'https://docs.test/public/a': { status: 200, body: 'a' },
        'https://docs.test/public/b': { status: 200, body: 'b' },
    });
    const client = new DocsClient({ crawlDelayMs: 0, fetch: site.fetchImpl });

    assert.equal(await client.fetchHtml('https://docs.test/public/a'), 'a');
    await assert.rejects(
        client.fetchHtml('https://docs.test/private/page'),
        { name: 'FetchError', message: 'robots.txt disallows https://docs.test/private/page' },
    );
    assert.equal(await client.fetchHtml('https://docs.test/public/b'), 'b');

    // robots.txt read once, the disallowed page never requested
    assert.deepEqual(site.requests.map(r => r.url), [
        'https://docs.test/robots.txt',
        'https://docs.test/public/a',
        'https://docs.test/public/b',
    ]);
    console.log('✓ Test 4 passed: disallowed URL refused, robots.txt cached');
}

// ── Test 5: missing robots.txt allows everything ─────────────────────────────
{
    const site = fakeSite({ 'https://docs.test/private/page': { status: 200, body: 'ok' } });
    const client = new DocsClient({ crawlDelayMs: 0, fetch: site.fetchImpl });

    assert.equal(await client.fetchHtml('https://docs.test/private/page'), 'ok');
    console.log('✓ Test 5 passed: 404 robots.txt means allow all');
}

// ── Test 6: close() drops the robots cache ───────────────────────────────────
{
    const site = fakeSite({
        'https://docs.test/robots.txt': { status: 200, body: ROBOTS },
        'https://docs.test/public/a': { status: 200, body: 'a' },
    });
    const client = new DocsClient({ crawlDelayMs: 0, fetch: site.fetchImpl });

    await client.fetchHtml('https://docs.test/public/a');
    client.close();
    await client.fetchHtml('https://docs.test/public/a');

    assert.equal(site.requests.filter(r => r.url.endsWith('/robots.txt')).length, 2);
    console.log('✓ Test 6 passed: robots.txt read again after close()');
}

console.log('\n✅ All client tests passed!');
