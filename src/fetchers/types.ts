/**
 * Feed reader types and interfaces
 */

/**
 * A headline read from a category feed. `link` is the stable key used for tag caching.
 */
export interface FeedItem {
    readonly title: string;
    readonly summary: string;
    readonly link: string;
    readonly publishedAt?: string;
}

/**
 * Outcome of loading a feed document
 */
export type FeedLoadResult =
    | { ok: true; items: FeedItem[]; skipped: number }
    | { ok: false; reason: FeedFailureReason; error: string };

export type FeedFailureReason = 'transport' | 'http' | 'parse';

export interface FeedReaderOptions {
    timeoutMs?: number;
    userAgent?: string;
}

/**
 * Feed reader - never throws, failures resolve to an empty list
 */
export interface FeedReader {
    fetch(feedUrl: string, maxItems?: number): Promise<FeedItem[]>;
}
