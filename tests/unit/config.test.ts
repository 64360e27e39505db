/**
 * Configuration Tests
 */
import { describe, it, expect } from 'vitest';
import { configSchema, mapEnvToConfig, pathToEnvVar, getRedactedConfig } from '../../src/config/index.js';
import { loadCategoryFeeds, parseCategoryFeeds } from '../../src/config/feeds.js';

function parseEnv(env: NodeJS.ProcessEnv) {
    return configSchema.parse(mapEnvToConfig(env));
}

describe('Environment configuration', () => {
    it('applies defaults when nothing is set', () => {
        const cfg = parseEnv({});

        expect(cfg.geminiApiKey).toBeNull();
        expect(cfg.geminiModel).toBe('gemini-2.5-flash');
        expect(cfg.port).toBe(5000);
        expect(cfg.feedTimeoutMs).toBe(10000);
        expect(cfg.generationTimeoutMs).toBe(30000);
        expect(cfg.feedMaxItems).toBe(20);
        expect(cfg.responseItems).toBe(10);
        expect(cfg.summaryMaxLength).toBe(150);
    });

    it('prefers GEMINI_API_KEY over GOOGLE_API_KEY', () => {
        expect(parseEnv({ GEMINI_API_KEY: 'test-gemini', GOOGLE_API_KEY: 'test-google' }).geminiApiKey).toBe('test-gemini');
        expect(parseEnv({ GOOGLE_API_KEY: 'test-google' }).geminiApiKey).toBe('test-google');
    });

    it('treats an empty credential as absent', () => {
        expect(parseEnv({ GEMINI_API_KEY: '', GOOGLE_API_KEY: 'test-google' }).geminiApiKey).toBe('test-google');
        expect(parseEnv({ GEMINI_API_KEY: '' }).geminiApiKey).toBeNull();
    });

    it('reads model and port overrides', () => {
        const cfg = parseEnv({ GEMINI_MODEL: 'gemini-2.0-flash', PORT: '8080' });

        expect(cfg.geminiModel).toBe('gemini-2.0-flash');
        expect(cfg.port).toBe(8080);
    });

    it('rejects an invalid port', () => {
        expect(configSchema.safeParse(mapEnvToConfig({ PORT: '70000' })).success).toBe(false);
    });

    it('maps config paths back to environment variable names', () => {
        expect(pathToEnvVar('geminiApiKey')).toBe('GEMINI_API_KEY');
        expect(pathToEnvVar('feedTimeoutMs')).toBe('FEED_TIMEOUT_MS');
    });

    it('never exposes the credential when redacted', () => {
        const redacted = getRedactedConfig(parseEnv({ GEMINI_API_KEY: 'test-secret' }));

        expect(redacted.geminiApiKey).toBe('[CONFIGURED]');
    });
});

describe('Category feed table', () => {
    it('loads the bundled table in document order', () => {
        const feeds = loadCategoryFeeds();

        expect(Array.from(feeds.keys())).toEqual(['政治', '経済', 'IT・科学', '国際', 'テクノロジー']);
        expect(feeds.get('経済')).toBe('https://news.google.com/rss/headlines/section/topic/BUSINESS?hl=ja&gl=JP&ceid=JP:ja');
    });

    it('rejects a table with an invalid URL', () => {
        expect(() => parseCategoryFeeds({ categories: { 経済: 'not a url' } })).toThrow(/Invalid feed table/);
    });

    it('rejects an empty table', () => {
        expect(() => parseCategoryFeeds({ categories: {} })).toThrow('Invalid feed table: at least one category is required');
    });
});
