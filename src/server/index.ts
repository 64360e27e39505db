/**
 * Fastify server setup
 */
import Fastify, { type FastifyInstance } from 'fastify';
import { v4 as uuidv4 } from 'uuid';
import { logger } from '../observability/logger.js';
import type { NewsService } from '../services/news.service.js';
import { healthRoutes } from './routes/health.js';
import { metricsRoutes } from './routes/metrics.js';
import { newsRoutes } from './routes/news.js';

export interface ServerOptions {
    logLevel?: string;
}

export interface ServerDependencies {
    newsService: NewsService;
}

let server: FastifyInstance | null = null;

/**
 * Create and configure Fastify server
 */
export function createServer(options: ServerOptions = {}): FastifyInstance {
    const fastify = Fastify({
        logger: {
            level: options.logLevel ?? 'info',
        },
        genReqId: () => uuidv4(),
    });

    fastify.setErrorHandler(async (error, request, reply) => {
        logger.error('Unhandled route error', error, { requestId: request.id, url: request.url });
        return reply.status(500).send({ error: 'Internal server error' });
    });

    return fastify;
}

/**
 * Register all routes
 */
export async function registerRoutes(fastify: FastifyInstance, deps: ServerDependencies): Promise<void> {
    await fastify.register(healthRoutes);
    await fastify.register(metricsRoutes);
    await fastify.register(newsRoutes, { newsService: deps.newsService });

    logger.info('Routes registered: /health, /metrics, /api/categories, /api/news/:category');
}

/**
 * Start the server
 */
export async function startServer(
    deps: ServerDependencies,
    listen: { host: string; port: number; logLevel?: string }
): Promise<FastifyInstance> {
    server = createServer({ logLevel: listen.logLevel });
    await registerRoutes(server, deps);

    await server.listen({ port: listen.port, host: listen.host });
    logger.info(`Server listening on http://${listen.host}:${listen.port}`);

    return server;
}

/**
 * Stop the server
 */
export async function stopServer(): Promise<void> {
    if (server) {
        await server.close();
        server = null;
        logger.info('Server stopped');
    }
}
