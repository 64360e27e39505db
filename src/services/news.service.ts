/**
 * News service
 * category -> feed -> tag annotation -> response items
 */
import type { TagCache } from '../cache/tag-cache.js';
import type { CategoryFeeds } from '../config/feeds.js';
import type { FeedReader } from '../fetchers/types.js';
import type { TagGenerator } from '../ai/tag-generator.js';
import { createLogger } from '../observability/logger.js';

export interface NewsItem {
    title: string;
    summary: string;
    link: string;
    publishedAt?: string;
    tags: string[];
}

export type NewsResult =
    | { kind: 'ok'; category: string; news: NewsItem[] }
    | { kind: 'unknown-category'; category: string }
    | { kind: 'no-items'; category: string };

export interface NewsServiceOptions {
    feeds: CategoryFeeds;
    feedReader: FeedReader;
    tagGenerator: TagGenerator;
    cache: TagCache;
    feedMaxItems: number;
    responseItems: number;
    summaryMaxLength: number;
}

export class NewsService {
    constructor(private readonly options: NewsServiceOptions) { }

    listCategories(): string[] {
        return Array.from(this.options.feeds.keys());
    }

    async getCategoryNews(category: string, requestId?: string): Promise<NewsResult> {
        const reqLogger = createLogger({ requestId, category });

        const feedUrl = this.options.feeds.get(category);
        if (!feedUrl) {
            reqLogger.info('Unknown category requested');
            return { kind: 'unknown-category', category };
        }

        const items = await this.options.feedReader.fetch(feedUrl, this.options.feedMaxItems);
        if (items.length === 0) {
            reqLogger.warn('Feed produced no usable items', { feedUrl });
            return { kind: 'no-items', category };
        }

        const target = items.slice(0, this.options.responseItems);
        await this.options.tagGenerator.annotate(target);

        const news = target.map((item): NewsItem => ({
            title: item.title,
            summary: Array.from(item.summary).slice(0, this.options.summaryMaxLength).join(''),
            link: item.link,
            ...(item.publishedAt ? { publishedAt: item.publishedAt } : {}),
            tags: this.options.cache.get(item.link) ?? [],
        }));

        reqLogger.child({ stage: 'assemble' }).debug('News assembled', { count: news.length });
        return { kind: 'ok', category, news };
    }
}
