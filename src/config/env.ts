/**
 * Centralized Environment Configuration
 *
 * Validates environment variables with Zod.
 * Import this module instead of accessing process.env directly.
 *
 * @example
 * ```typescript
 * import { loadEnv } from './config/env.js';
 * const env = loadEnv();
 * console.log(env.LOG_LEVEL); // Type-safe access
 * ```
 */

import { z } from 'zod';
import { ConfigurationError } from '../errors/index.js';

/**
 * Environment variable schema with validation
 */
const envSchema = z.object({
    /**
     * Gemini API key
     * Get yours at: https://aistudio.google.com/app/apikey
     */
    GEMINI_API_KEY: z
        .string()
        .optional()
        .describe('Gemini API key'),

    /**
     * Gemini model override
     */
    GEMINI_MODEL: z
        .string()
        .min(1)
        .optional()
        .describe('Gemini model name'),

    /**
     * Log level for the logger
     * @default 'info'
     */
    LOG_LEVEL: z
        .enum(['debug', 'info', 'warn', 'error'])
        .default('info')
        .describe('Log level: debug, info, warn, error'),

    /**
     * pdftoppm executable, when it is not on PATH
     */
    PDFTOPPM_PATH: z
        .string()
        .min(1)
        .optional()
        .describe('Path to the poppler pdftoppm binary'),
});

/**
 * Validated environment type
 */
export type Env = z.infer<typeof envSchema>;

/**
 * Parse environment variables with validation
 * Returns validated env object or throws with descriptive errors
 */
export function loadEnv(source: NodeJS.ProcessEnv = process.env): Env {
    const result = envSchema.safeParse(source);

    if (!result.success) {
        const errors = result.error.issues
            .map((issue) => `  ${issue.path.join('.')}: ${issue.message}`)
            .join('\n');

        throw new ConfigurationError(`Environment validation failed:\n${errors}`);
    }

    return result.data;
}

/**
 * Check if an optional env var is configured
 */
export function hasEnv(env: Env, key: keyof Env): boolean {
    return env[key] !== undefined && env[key] !== '';
}
