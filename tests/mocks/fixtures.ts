/**
 * Test Fixtures
 *
 * Factory functions for creating test data.
 * Uses @faker-js/faker for varied metadata.
 */

import { faker } from '@faker-js/faker';
import * as fs from 'fs/promises';
import * as os from 'os';
import * as path from 'path';
import { vi } from 'vitest';
import type { MetadataRecord } from '../../src/types/metadata.types.js';
import type { PageImage } from '../../src/types/renderer.types.js';
import type { PaperRenamerConfig, ResolvedConfig } from '../../src/types/config.types.js';
import { resolveConfig } from '../../src/types/config.types.js';
import type { Clock } from '../../src/utils/rate-limiter.js';

// ========================================
// METADATA FIXTURES
// ========================================

export function createMetadataRecord(overrides?: Partial<MetadataRecord>): MetadataRecord {
    return {
        title: faker.lorem.words({ min: 2, max: 6 }),
        author: `${faker.person.firstName()} ${faker.person.lastName()}`,
        year: String(faker.number.int({ min: 1900, max: 2025 })),
        source_filename: `${faker.string.alphanumeric(8)}.pdf`,
        ...overrides,
    };
}

// ========================================
// PAGE FIXTURES
// ========================================

/** PNG signature followed by filler bytes */
const PNG_SIGNATURE = Buffer.from([0x89, 0x50, 0x4e, 0x47, 0x0d, 0x0a, 0x1a, 0x0a]);

export function createPageImage(pageNumber: number): PageImage {
    return {
        pageNumber,
        mimeType: 'image/png',
        data: Buffer.concat([PNG_SIGNATURE, Buffer.from(`page-${pageNumber}`)]),
    };
}

export function createPageImages(count: number): PageImage[] {
    return Array.from({ length: count }, (_, index) => createPageImage(index + 1));
}

// ========================================
// CONFIG FIXTURES
// ========================================

export function createTestConfig(overrides?: Partial<PaperRenamerConfig>): ResolvedConfig {
    return resolveConfig({
        geminiApiKey: 'test-api-key',
        ...overrides,
    });
}

// ========================================
// CLOCK FIXTURES
// ========================================

export interface FakeClock extends Clock {
    /** Advance time without sleeping */
    advance(ms: number): void;
    /** Every sleep duration requested, in order */
    readonly sleeps: number[];
}

/**
 * Clock whose sleep resolves immediately and moves time forward
 */
export function createFakeClock(start = 1_000_000): FakeClock {
    let current = start;
    const sleeps: number[] = [];

    return {
        now: () => current,
        sleep: vi.fn(async (ms: number) => {
            sleeps.push(ms);
            current += ms;
        }),
        advance: (ms: number) => {
            current += ms;
        },
        sleeps,
    };
}

// ========================================
// FILE SYSTEM FIXTURES
// ========================================

export async function createTempDir(prefix = 'paper-renamer-test-'): Promise<string> {
    return fs.mkdtemp(path.join(os.tmpdir(), prefix));
}

export async function removeTempDir(dir: string): Promise<void> {
    await fs.rm(dir, { recursive: true, force: true });
}

/**
 * Write a file standing in for a PDF; rendering is mocked, so content is arbitrary
 */
export async function writeFakePdf(dir: string, filename: string, content = '%PDF-1.4\n%fake\n'): Promise<string> {
    const filePath = path.join(dir, filename);
    await fs.writeFile(filePath, content);
    return filePath;
}
