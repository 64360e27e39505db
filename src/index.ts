/**
 * Headline Tagger - Main entry point
 *
 * Serves category news feeds as JSON, each headline enriched with up to three
 * generated tags. Tags are cached per link for the lifetime of the process.
 */
import { config, getRedactedConfig } from './config/index.js';
import { loadCategoryFeeds } from './config/feeds.js';
import { logger } from './observability/logger.js';
import { TagCache } from './cache/tag-cache.js';
import { createFeedReader } from './fetchers/rss.fetcher.js';
import { createGeminiClient, TagGenerator } from './ai/index.js';
import { CircuitBreaker } from './services/circuit-breaker.js';
import { NewsService } from './services/news.service.js';
import { startServer, stopServer } from './server/index.js';

async function main(): Promise<void> {
    logger.info('Starting Headline Tagger...');
    logger.info('Configuration loaded', getRedactedConfig(config));

    try {
        const feeds = loadCategoryFeeds(config.feedsConfigPath);
        logger.info('Category feeds loaded', { categories: Array.from(feeds.keys()) });

        // No stale tags survive a restart
        const cache = new TagCache();
        cache.clear();
        logger.info('Tag cache cleared');

        const client = createGeminiClient({
            apiKey: config.geminiApiKey,
            model: config.geminiModel,
            baseUrl: config.geminiBaseUrl,
            timeoutMs: config.generationTimeoutMs,
            circuitBreaker: new CircuitBreaker({
                name: 'gemini',
                failureThreshold: config.cbFailureThreshold,
                resetTimeout: config.cbResetTimeoutMs,
                halfOpenRequests: config.cbHalfOpenRequests,
            }),
        });
        if (!client.isConfigured()) {
            logger.warn('GEMINI_API_KEY / GOOGLE_API_KEY not set, headlines will be served without tags');
        }

        const newsService = new NewsService({
            feeds,
            feedReader: createFeedReader({
                timeoutMs: config.feedTimeoutMs,
                userAgent: config.feedUserAgent,
            }),
            tagGenerator: new TagGenerator({ cache, client }),
            cache,
            feedMaxItems: config.feedMaxItems,
            responseItems: config.responseItems,
            summaryMaxLength: config.summaryMaxLength,
        });

        logger.info('Starting HTTP server...');
        await startServer({ newsService }, {
            host: config.host,
            port: config.port,
            logLevel: config.logLevel,
        });

        logger.info('Headline Tagger started successfully');
    } catch (error) {
        logger.error('Failed to start Headline Tagger', error);
        process.exit(1);
    }
}

// Graceful shutdown handler
async function shutdown(signal: string): Promise<void> {
    logger.info(`Received ${signal}, shutting down gracefully...`);

    try {
        await stopServer();
        logger.info('Headline Tagger stopped gracefully');
        process.exit(0);
    } catch (error) {
        logger.error('Error during shutdown', error);
        process.exit(1);
    }
}

// Register shutdown handlers
process.on('SIGTERM', () => void shutdown('SIGTERM'));
process.on('SIGINT', () => void shutdown('SIGINT'));

// Handle uncaught errors
process.on('uncaughtException', (error) => {
    logger.error('Uncaught exception', error);
    process.exit(1);
});

process.on('unhandledRejection', (reason) => {
    logger.error('Unhandled rejection', reason);
    process.exit(1);
});

// Start the service
void main();
