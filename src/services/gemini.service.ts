import {
    GoogleGenerativeAI,
    GoogleGenerativeAIFetchError,
    type GenerativeModel,
    type Part,
} from '@google/generative-ai';
import type { ResolvedConfig } from '../types/config.types.js';
import type { PageImage } from '../types/renderer.types.js';
import type {
    IVisionModel,
    VisionGenerateOptions,
    VisionResponse,
} from '../types/vision-model.types.js';
import { GeminiAPIError } from '../errors/index.js';
import type { Logger } from '../utils/logger.js';

const URL_PATTERN = /https?:\/\/\S+/g;

/**
 * Create Gemini inline-data parts from page images
 */
export function toInlineParts(images: readonly PageImage[]): Part[] {
    return images.map((image) => ({
        inlineData: {
            mimeType: image.mimeType,
            data: image.data.toString('base64'),
        },
    }));
}

/**
 * Rewrite an SDK error so its message describes the failure, not the endpoint.
 *
 * The SDK puts the request URL (".../models/x:generateContent") into its
 * messages, and callers classify failures by message text.
 */
export function normalizeGeminiError(error: unknown): GeminiAPIError {
    if (error instanceof GoogleGenerativeAIFetchError) {
        const message = error.message.replace(URL_PATTERN, '<endpoint>');
        return new GeminiAPIError(message, { statusCode: error.status, cause: error });
    }

    const original = error instanceof Error ? error : new Error(String(error));
    const message = original.message.replace(URL_PATTERN, '<endpoint>');

    // fetch() reports DNS, TLS and socket failures only as "fetch failed"
    if (message.toLowerCase().includes('fetch failed')) {
        return new GeminiAPIError(`Network error: ${message}`, { cause: original });
    }

    return new GeminiAPIError(message, { cause: original });
}

/**
 * Gemini vision client
 *
 * Sends page images followed by an instruction and returns the raw text.
 * Retries are the caller's business.
 */
export class GeminiService implements IVisionModel {
    private readonly model: GenerativeModel;
    private readonly config: ResolvedConfig;
    private readonly logger: Logger;

    constructor(config: ResolvedConfig, logger: Logger) {
        const genAI = new GoogleGenerativeAI(config.geminiApiKey);
        this.model = genAI.getGenerativeModel({ model: config.model });
        this.config = config;
        this.logger = logger;

        this.logger.debug('GeminiService initialized', {
            model: config.model,
        });
    }

    /**
     * Generate content with vision (PDF pages as images)
     */
    async generateWithVision(
        prompt: string,
        images: readonly PageImage[],
        options?: VisionGenerateOptions
    ): Promise<VisionResponse> {
        try {
            const result = await this.model.generateContent({
                contents: [
                    {
                        role: 'user',
                        parts: [...toInlineParts(images), { text: prompt }],
                    },
                ],
                generationConfig: {
                    temperature: options?.temperature ?? this.config.generationConfig.temperature,
                    maxOutputTokens: options?.maxOutputTokens ?? this.config.generationConfig.maxOutputTokens,
                },
            });

            const response = result.response;
            const text = response.text();
            const usage = response.usageMetadata;

            return {
                text,
                tokenUsage: {
                    input: usage?.promptTokenCount ?? 0,
                    output: usage?.candidatesTokenCount ?? 0,
                    total: usage?.totalTokenCount ?? 0,
                },
            };
        } catch (error) {
            const normalized = normalizeGeminiError(error);
            this.logger.debug('Gemini API call failed', {
                error: normalized.message,
                statusCode: normalized.statusCode,
            });
            throw normalized;
        }
    }
}
