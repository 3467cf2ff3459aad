import type { PageImage } from './renderer.types.js';
import type { TokenUsage } from './metadata.types.js';

/**
 * Vision generation options
 */
export interface VisionGenerateOptions {
    /** Temperature for response randomness (0.0 - 2.0) */
    temperature?: number;
    /** Maximum tokens in response */
    maxOutputTokens?: number;
}

/**
 * Response from a vision model call
 */
export interface VisionResponse {
    /** Raw response text, untyped */
    text: string;
    /** Token usage statistics */
    tokenUsage: TokenUsage;
}

/**
 * Vision model client interface
 *
 * Failures surface as thrown errors; their message text is the only signal
 * the extractor uses to decide whether to retry.
 *
 * @example
 * ```typescript
 * const response = await model.generateWithVision(prompt, images);
 * console.log(response.text);
 * ```
 */
export interface IVisionModel {
    /**
     * Send page images followed by an instruction text
     * @param prompt - Instruction text, sent after the images
     * @param images - Page images, sent in order
     * @param options - Generation options
     */
    generateWithVision(
        prompt: string,
        images: readonly PageImage[],
        options?: VisionGenerateOptions
    ): Promise<VisionResponse>;
}
