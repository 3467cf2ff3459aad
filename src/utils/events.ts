import { EventEmitter } from 'events';
import type { MetadataRecord } from '../types/metadata.types.js';
import type { BatchSummary } from '../types/batch.types.js';
import type { RetryableErrorKind } from '../errors/index.js';

/**
 * Event types emitted while processing PDFs
 */
export interface PaperRenamerEvents {
    // Batch events
    'batch:start': { sourceDir: string; fileCount: number; outputDir?: string; resultsPath?: string };
    'batch:complete': BatchSummary;
    'batch:invalid': { sourceDir: string; reason: string };

    // Per-file events
    'file:start': { index: number; total: number; filename: string };
    'file:complete': { index: number; total: number; record: MetadataRecord; durationMs: number };
    'results:saved': { resultsPath: string; filename: string; saved: boolean };

    // Pacing events
    'rate-limit:wait': { delayMs: number };
    'extraction:retry': { filename: string; attempt: number; maxAttempts: number; kind: RetryableErrorKind; delayMs: number };
}

/**
 * Type-safe event emitter
 */
export class PaperRenamerEventEmitter extends EventEmitter {
    emit<K extends keyof PaperRenamerEvents>(
        event: K,
        data: PaperRenamerEvents[K]
    ): boolean {
        return super.emit(event, data);
    }

    on<K extends keyof PaperRenamerEvents>(
        event: K,
        listener: (data: PaperRenamerEvents[K]) => void
    ): this {
        return super.on(event, listener);
    }

    once<K extends keyof PaperRenamerEvents>(
        event: K,
        listener: (data: PaperRenamerEvents[K]) => void
    ): this {
        return super.once(event, listener);
    }

    off<K extends keyof PaperRenamerEvents>(
        event: K,
        listener: (data: PaperRenamerEvents[K]) => void
    ): this {
        return super.off(event, listener);
    }
}

/**
 * Create a new event emitter instance
 */
export function createEventEmitter(): PaperRenamerEventEmitter {
    return new PaperRenamerEventEmitter();
}
