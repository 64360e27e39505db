/**
 * Health endpoint - liveness check
 * GET /health
 */
import type { FastifyInstance } from 'fastify';

interface HealthResponse {
    status: 'healthy';
    uptimeSeconds: number;
    timestamp: string;
}

export async function healthRoutes(fastify: FastifyInstance): Promise<void> {
    fastify.get<{ Reply: HealthResponse }>('/health', async (_request, reply) => {
        return reply.send({
            status: 'healthy',
            uptimeSeconds: Math.round(process.uptime()),
            timestamp: new Date().toISOString(),
        });
    });
}
