/**
 * RSS Feed Reader
 * Fetches a category feed and turns its items into normalized headlines
 */
import Parser from 'rss-parser';
import { createLogger } from '../observability/logger.js';
import { feedFetchDuration, feedFetchesTotal } from '../observability/metrics.js';
import { stripLeadingMarker } from '../normalizers/text.normalizer.js';
import type { FeedItem, FeedLoadResult, FeedReader, FeedReaderOptions } from './types.js';

export const DEFAULT_FEED_TIMEOUT_MS = 10000;
export const DEFAULT_MAX_ITEMS = 20;
const DEFAULT_USER_AGENT = 'Mozilla/5.0';

// Keep the raw description; rss-parser otherwise only exposes it as `content`
type FeedRecordFields = { description?: string };

// Fields read from a parsed record; values are checked before use
export type FeedRecord = {
    title?: unknown;
    link?: unknown;
    description?: unknown;
    pubDate?: unknown;
};

const parser = new Parser<Record<string, unknown>, FeedRecordFields>({
    // <rss> roots without a version attribute are read as RSS 2.0
    defaultRSS: 2,
    customFields: {
        item: ['description'],
    },
});

function textOf(value: unknown): string {
    return typeof value === 'string' ? value.trim() : '';
}

/**
 * Map parsed feed records to headlines, dropping records without a title or link.
 * `maxItems` bounds the returned list, so dropped records do not use up the budget.
 */
export function toFeedItems(
    records: ReadonlyArray<FeedRecord>,
    maxItems: number
): { items: FeedItem[]; skipped: number } {
    const items: FeedItem[] = [];
    let skipped = 0;

    for (const record of records) {
        if (items.length >= maxItems) {
            break;
        }

        const title = stripLeadingMarker(textOf(record.title));
        const link = textOf(record.link);

        if (!title || !link) {
            skipped++;
            continue;
        }

        const publishedAt = textOf(record.pubDate);
        items.push({
            title,
            summary: stripLeadingMarker(textOf(record.description)),
            link,
            ...(publishedAt ? { publishedAt } : {}),
        });
    }

    return { items, skipped };
}

export function createFeedReader(options: FeedReaderOptions = {}): FeedReader {
    const timeoutMs = options.timeoutMs ?? DEFAULT_FEED_TIMEOUT_MS;
    const userAgent = options.userAgent ?? DEFAULT_USER_AGENT;

    async function load(feedUrl: string, maxItems: number): Promise<FeedLoadResult> {
        const controller = new AbortController();
        const timeout = setTimeout(() => controller.abort(), timeoutMs);

        let body: string;
        try {
            const response = await fetch(feedUrl, {
                headers: {
                    'User-Agent': userAgent,
                    'Accept': 'application/rss+xml, application/xml, text/xml, */*',
                },
                signal: controller.signal,
            });

            if (!response.ok) {
                return { ok: false, reason: 'http', error: `Feed responded with HTTP ${response.status}` };
            }

            body = await response.text();
        } catch (error) {
            return { ok: false, reason: 'transport', error: error instanceof Error ? error.message : String(error) };
        } finally {
            clearTimeout(timeout);
        }

        try {
            const feed = await parser.parseString(body);
            return { ok: true, ...toFeedItems(feed.items, maxItems) };
        } catch (error) {
            return { ok: false, reason: 'parse', error: error instanceof Error ? error.message : String(error) };
        }
    }

    return {
        async fetch(feedUrl: string, maxItems: number = DEFAULT_MAX_ITEMS): Promise<FeedItem[]> {
            const feedLogger = createLogger({ feedUrl, stage: 'feed' });
            const endTimer = feedFetchDuration.startTimer();

            feedLogger.debug('Fetching feed', { maxItems });
            const result = await load(feedUrl, maxItems);
            endTimer();

            if (!result.ok) {
                feedFetchesTotal.inc({ outcome: result.reason });
                feedLogger.warn('Feed unavailable, returning no items', {
                    reason: result.reason,
                    error: result.error,
                });
                return [];
            }

            feedFetchesTotal.inc({ outcome: 'success' });
            feedLogger.info('Feed fetched', {
                totalItems: result.items.length,
                skipped: result.skipped,
            });
            return result.items;
        },
    };
}
