import test from 'node:test';
import assert from 'node:assert/strict';
import { CrawlOptionsSchema, parseCrawlOptions, splitIgnore, toCrawlConfig } from '../src/schemas.js';
import { DEFAULT_LINK_CLASS } from '../src/core/LinkClassifier.js';
import { InputValidationError } from '../src/errors.js';

function issuesOf(fn: () => unknown): string[] {
    try {
        fn();
    } catch (err) {
        if (err instanceof InputValidationError) return err.issues;
        throw err;
    }
    assert.fail('expected InputValidationError');
}

test('crawl schema applies defaults', () => {
    const parsed = CrawlOptionsSchema.parse({
        url: 'https://github.com/acme/tool',
        extension: '.cs',
    });

    assert.deepEqual(parsed.ignore, []);
    assert.equal(parsed.origin, 'https://github.com');
    assert.equal(parsed.linkClass, DEFAULT_LINK_CLASS);
    assert.equal(parsed.concurrency, undefined);
    assert.equal(parsed.minDelayMs, 0);
    assert.equal(parsed.timeoutMs, 30000);
    assert.equal(parsed.retries, 0);
    assert.equal(parsed.userAgent, 'repo-checklist');
});

test('url must live on the configured origin', () => {
    assert.deepEqual(
        issuesOf(() => parseCrawlOptions({ url: 'http://github.com/acme/tool', extension: '.cs' })),
        ['url: URL must start with https://github.com/']
    );
    assert.deepEqual(
        issuesOf(() => parseCrawlOptions({ url: 'https://gitlab.example/acme/tool', extension: '.cs' })),
        ['url: URL must start with https://github.com/']
    );

    const parsed = parseCrawlOptions({
        url: 'https://code.example/acme/tool',
        extension: '.cs',
        origin: 'https://code.example/',
    });
    assert.equal(parsed.url, 'https://code.example/acme/tool');
});

test('extension must be a dot-prefixed token', () => {
    for (const extension of ['cs', '.c s', '']) {
        const issues = issuesOf(() => parseCrawlOptions({ url: 'https://github.com/acme/tool', extension }));
        assert.ok(issues.some((i) => i.startsWith('extension: ')), `expected an extension issue for "${extension}"`);
    }
    assert.equal(parseCrawlOptions({ url: 'https://github.com/acme/tool', extension: '.' }).extension, '.');
});

test('ignore patterns must compile', () => {
    assert.deepEqual(
        issuesOf(() => parseCrawlOptions({ url: 'https://github.com/acme/tool', extension: '.cs', ignore: ['ok', '('] })),
        ['ignore.1: Invalid pattern: (']
    );
});

test('numeric bounds are enforced', () => {
    assert.ok(
        issuesOf(() => parseCrawlOptions({ url: 'https://github.com/acme/tool', extension: '.cs', concurrency: 0 }))
            .some((i) => i.startsWith('concurrency: '))
    );
    assert.ok(
        issuesOf(() => parseCrawlOptions({ url: 'https://github.com/acme/tool', extension: '.cs', minDelayMs: -1 }))
            .some((i) => i.startsWith('minDelayMs: '))
    );
});

test('splitIgnore drops empty tokens', () => {
    assert.deepEqual(splitIgnore('  vendor   Platform.Tests '), ['vendor', 'Platform.Tests']);
    assert.deepEqual(splitIgnore(''), []);
    assert.deepEqual(splitIgnore(undefined), []);
});

test('toCrawlConfig carries every setting into the crawl', () => {
    const onFetch = () => {};
    const config = toCrawlConfig(
        parseCrawlOptions({
            url: 'https://github.com/acme/tool',
            extension: '.cs',
            ignore: ['vendor'],
            concurrency: 4,
            minDelayMs: 100,
        }),
        onFetch
    );

    assert.deepEqual(config, {
        extension: '.cs',
        ignorePatterns: ['vendor'],
        origin: 'https://github.com',
        linkClass: DEFAULT_LINK_CLASS,
        concurrency: 4,
        minDelayMs: 100,
        timeoutMs: 30000,
        retries: 0,
        userAgent: 'repo-checklist',
        onFetch,
    });
});
