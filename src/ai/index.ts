/**
 * AI module exports
 */
export {
    createGeminiClient,
    extractCompletionText,
    type GenerationClient,
    type GenerationResult,
    type GenerationFailureReason,
} from './gemini.client.js';

export { buildTagPrompt, MAX_TAGS_PER_ITEM } from './prompts.js';
export { parseTagLine, splitResponseLines } from './tag-parser.js';
export { TagGenerator, type TagGeneratorOptions } from './tag-generator.js';
