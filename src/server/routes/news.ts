/**
 * News endpoints
 * GET /api/categories
 * GET /api/news/:category
 */
import type { FastifyInstance } from 'fastify';
import type { NewsItem, NewsService } from '../../services/news.service.js';

export type NewsRoutesOptions = {
    newsService: NewsService;
};

interface CategoriesResponse {
    categories: string[];
}

interface NewsResponse {
    news: NewsItem[];
    category: string;
}

interface ErrorResponse {
    error: string;
}

export async function newsRoutes(fastify: FastifyInstance, options: NewsRoutesOptions): Promise<void> {
    const { newsService } = options;

    fastify.get<{ Reply: CategoriesResponse }>('/api/categories', async (_request, reply) => {
        return reply.send({ categories: newsService.listCategories() });
    });

    fastify.get<{ Params: { category: string }; Reply: NewsResponse | ErrorResponse }>(
        '/api/news/:category',
        async (request, reply) => {
            const result = await newsService.getCategoryNews(request.params.category, request.id);

            switch (result.kind) {
                case 'unknown-category':
                    return reply.status(404).send({ error: `Unknown category: ${result.category}` });
                case 'no-items':
                    return reply.status(500).send({ error: 'Failed to fetch news' });
                case 'ok':
                    return reply.send({ news: result.news, category: result.category });
            }
        }
    );
}
