/**
 * Tag Generator
 * Fills the tag cache for a batch of headlines with a single generation call.
 */
import type { TagCache } from '../cache/tag-cache.js';
import type { FeedItem } from '../fetchers/types.js';
import { createLogger } from '../observability/logger.js';
import { tagCacheLookups } from '../observability/metrics.js';
import type { GenerationClient } from './gemini.client.js';
import { buildTagPrompt, MAX_TAGS_PER_ITEM } from './prompts.js';
import { parseTagLine, splitResponseLines } from './tag-parser.js';

export interface TagGeneratorOptions {
    cache: TagCache;
    client: GenerationClient;
    maxTags?: number;
}

const log = createLogger({ stage: 'generate' });

export class TagGenerator {
    private readonly cache: TagCache;
    private readonly client: GenerationClient;
    private readonly maxTags: number;
    // Links whose generation is under way in another request
    private readonly inFlight = new Map<string, Promise<void>>();

    constructor(options: TagGeneratorOptions) {
        this.cache = options.cache;
        this.client = options.client;
        this.maxTags = options.maxTags ?? MAX_TAGS_PER_ITEM;
    }

    /**
     * Make sure every item's link has a cache entry. Links already cached, or being
     * generated by a concurrent call, are never sent to the model again.
     * Resolves once all entries exist; never rejects.
     */
    async annotate(items: readonly FeedItem[]): Promise<void> {
        const uncached: FeedItem[] = [];
        const pending = new Set<Promise<void>>();
        const seen = new Set<string>();

        for (const item of items) {
            if (seen.has(item.link)) {
                continue;
            }
            seen.add(item.link);

            if (this.cache.has(item.link)) {
                tagCacheLookups.inc({ result: 'hit' });
                continue;
            }

            const inFlight = this.inFlight.get(item.link);
            if (inFlight) {
                tagCacheLookups.inc({ result: 'in-flight' });
                pending.add(inFlight);
                continue;
            }

            tagCacheLookups.inc({ result: 'miss' });
            uncached.push(item);
        }

        if (uncached.length > 0) {
            const batch = this.generateBatch(uncached);
            for (const item of uncached) {
                this.inFlight.set(item.link, batch);
            }
            pending.add(batch.finally(() => {
                for (const item of uncached) {
                    this.inFlight.delete(item.link);
                }
            }));
        }

        await Promise.all(pending);
    }

    private async generateBatch(items: readonly FeedItem[]): Promise<void> {
        if (!this.client.isConfigured()) {
            log.warn('No generation credential configured, caching empty tags', { count: items.length });
            this.assignEmpty(items);
            return;
        }

        const prompt = buildTagPrompt(items.map(item => item.title));
        log.debug('Requesting tags', { count: items.length, promptLength: prompt.length });

        const result = await this.client.generate(prompt);
        if (!result.ok) {
            log.warn('Tag generation failed, caching empty tags', {
                count: items.length,
                reason: result.reason,
                error: result.error,
            });
            this.assignEmpty(items);
            return;
        }

        const lines = splitResponseLines(result.text);
        if (lines.length !== items.length) {
            // Pairing is positional; items past the last line get an empty list
            log.warn('Answer line count does not match title count', {
                expected: items.length,
                received: lines.length,
            });
        }

        items.forEach((item, index) => {
            const line = lines[index];
            this.cache.set(item.link, line === undefined ? [] : parseTagLine(line, this.maxTags));
        });

        log.info('Tags generated', { count: items.length, lines: lines.length });
    }

    private assignEmpty(items: readonly FeedItem[]): void {
        for (const item of items) {
            this.cache.set(item.link, []);
        }
    }
}
