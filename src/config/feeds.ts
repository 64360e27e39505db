/**
 * Category feed table
 * Maps a category name to the RSS feed it is served from. Loaded once at startup.
 */
import { readFileSync } from 'fs';
import path from 'path';
import { z } from 'zod';

export const DEFAULT_FEEDS_PATH = path.resolve(process.cwd(), 'config', 'feeds.json');

const feedsFileSchema = z.object({
    categories: z.record(z.string().min(1), z.string().url('Feed URL must be a valid URL')),
});

export type CategoryFeeds = ReadonlyMap<string, string>;

/**
 * Parse a feed table document. Category order follows the document.
 */
export function parseCategoryFeeds(raw: unknown): CategoryFeeds {
    const result = feedsFileSchema.safeParse(raw);

    if (!result.success) {
        const problems = result.error.issues
            .map(issue => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
            .join('; ');
        throw new Error(`Invalid feed table: ${problems}`);
    }

    const feeds = new Map(Object.entries(result.data.categories));
    if (feeds.size === 0) {
        throw new Error('Invalid feed table: at least one category is required');
    }

    return feeds;
}

/**
 * Load the feed table from disk
 */
export function loadCategoryFeeds(filePath: string | null = null): CategoryFeeds {
    const resolved = filePath ?? DEFAULT_FEEDS_PATH;
    const content = readFileSync(resolved, 'utf-8');
    return parseCategoryFeeds(JSON.parse(content));
}
