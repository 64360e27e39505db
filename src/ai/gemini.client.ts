/**
 * Gemini generateContent client
 * One prompt in, one free-text completion out. Outcomes are returned as values.
 */
import { z } from 'zod';
import { logger } from '../observability/logger.js';
import { generationCallsTotal, generationLatency } from '../observability/metrics.js';
import { CircuitBreaker, CircuitOpenError } from '../services/circuit-breaker.js';

export const DEFAULT_GENERATION_TIMEOUT_MS = 30000;

export type GenerationFailureReason = 'missing-credential' | 'circuit-open' | 'transport' | 'http' | 'malformed';

export type GenerationResult =
    | { ok: true; text: string }
    | { ok: false; reason: GenerationFailureReason; error: string };

/**
 * Text generation seam used by the tag generator
 */
export interface GenerationClient {
    isConfigured(): boolean;
    generate(prompt: string): Promise<GenerationResult>;
}

export interface GeminiClientOptions {
    apiKey: string | null;
    model: string;
    baseUrl: string;
    timeoutMs?: number;
    circuitBreaker?: CircuitBreaker;
}

const generateContentResponseSchema = z.object({
    candidates: z.array(z.object({
        content: z.object({
            parts: z.array(z.object({
                text: z.string().optional(),
            })).nonempty(),
        }),
    })).nonempty(),
});

class GenerationError extends Error {
    constructor(readonly reason: 'transport' | 'http' | 'malformed', message: string) {
        super(message);
        this.name = 'GenerationError';
    }
}

function errorMessage(error: unknown): string {
    return error instanceof Error ? error.message : String(error);
}

/**
 * Pull the completion text out of a generateContent response body
 */
export function extractCompletionText(body: unknown): string {
    const parsed = generateContentResponseSchema.safeParse(body);
    if (!parsed.success) {
        throw new GenerationError('malformed', `Unexpected response shape: ${parsed.error.issues[0]?.message ?? 'invalid'}`);
    }

    const text = parsed.data.candidates[0].content.parts[0].text;
    if (text === undefined) {
        throw new GenerationError('malformed', 'First candidate part has no text');
    }
    return text;
}

export function createGeminiClient(options: GeminiClientOptions): GenerationClient {
    const timeoutMs = options.timeoutMs ?? DEFAULT_GENERATION_TIMEOUT_MS;
    const circuitBreaker = options.circuitBreaker ?? new CircuitBreaker({ name: 'gemini' });
    const endpoint = `${options.baseUrl.replace(/\/+$/, '')}/models/${encodeURIComponent(options.model)}:generateContent`;

    async function requestCompletion(apiKey: string, prompt: string): Promise<string> {
        const url = new URL(endpoint);
        url.searchParams.set('key', apiKey);

        let response: Response;
        try {
            response = await fetch(url.toString(), {
                method: 'POST',
                headers: { 'Content-Type': 'application/json' },
                body: JSON.stringify({ contents: [{ parts: [{ text: prompt }] }] }),
                signal: AbortSignal.timeout(timeoutMs),
            });
        } catch (error) {
            throw new GenerationError('transport', errorMessage(error));
        }

        if (!response.ok) {
            const errorBody = await response.text().catch(() => '');
            throw new GenerationError('http', `Gemini API error: ${response.status} ${errorBody.slice(0, 200)}`.trim());
        }

        let body: unknown;
        try {
            body = await response.json();
        } catch (error) {
            throw new GenerationError('malformed', `Invalid JSON body: ${errorMessage(error)}`);
        }

        return extractCompletionText(body);
    }

    return {
        isConfigured(): boolean {
            return options.apiKey !== null && options.apiKey !== '';
        },

        async generate(prompt: string): Promise<GenerationResult> {
            const apiKey = options.apiKey;
            if (!apiKey) {
                generationCallsTotal.inc({ outcome: 'missing-credential' });
                return { ok: false, reason: 'missing-credential', error: 'No Gemini API key configured' };
            }

            const endTimer = generationLatency.startTimer();
            try {
                const text = await circuitBreaker.execute(() => requestCompletion(apiKey, prompt));
                generationCallsTotal.inc({ outcome: 'success' });
                logger.debug('Gemini completion received', { model: options.model, textLength: text.length });
                return { ok: true, text };
            } catch (error) {
                const reason: GenerationFailureReason = error instanceof CircuitOpenError
                    ? 'circuit-open'
                    : error instanceof GenerationError ? error.reason : 'transport';
                generationCallsTotal.inc({ outcome: reason });
                return { ok: false, reason, error: errorMessage(error) };
            } finally {
                endTimer();
            }
        },
    };
}
