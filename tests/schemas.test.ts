import { describe, it, expect } from 'vitest';
import {
    ModelMetadataSchema,
    AuthorFieldSchema,
    MetadataRecordSchema,
} from '../src/schemas/index.js';

describe('Validation Schemas', () => {
    describe('AuthorFieldSchema', () => {
        it('should tag a single author', () => {
            expect(AuthorFieldSchema.parse('Ada Lovelace')).toEqual({ kind: 'single', value: 'Ada Lovelace' });
        });

        it('should tag an author list', () => {
            expect(AuthorFieldSchema.parse(['A', 'B'])).toEqual({ kind: 'list', values: ['A', 'B'] });
        });

        it('should pass null through', () => {
            expect(AuthorFieldSchema.parse(null)).toBeNull();
        });

        it('should treat objects as missing', () => {
            expect(AuthorFieldSchema.parse({ name: 'A' })).toBeUndefined();
            expect(AuthorFieldSchema.parse(true)).toBeUndefined();
        });

        it('should drop list entries that are not names', () => {
            expect(AuthorFieldSchema.parse(['A', null, { name: 'B' }, 7])).toEqual({
                kind: 'list',
                values: ['A', '7'],
            });
        });
    });

    describe('ModelMetadataSchema', () => {
        it('should stringify numeric fields', () => {
            const result = ModelMetadataSchema.parse({ title: 'T', author: 'A', year: 1999 });

            expect(result.year).toBe('1999');
        });

        it('should keep valid fields next to a malformed one', () => {
            const result = ModelMetadataSchema.parse({ title: 'T', author: { name: 'A' }, year: false });

            expect(result).toEqual({ title: 'T', author: undefined, year: undefined });
        });

        it('should ignore extra keys', () => {
            const result = ModelMetadataSchema.parse({
                title: 'T',
                author: 'A',
                year: '1999',
                source_filename: 'echo.pdf',
            });

            expect(result).toEqual({ title: 'T', author: { kind: 'single', value: 'A' }, year: '1999' });
        });
    });

    describe('MetadataRecordSchema', () => {
        it('should accept a stored record with placement', () => {
            const result = MetadataRecordSchema.safeParse({
                title: 'T',
                author: 'A',
                year: '2021',
                source_filename: 'scan.pdf',
                placement: {
                    copied: true,
                    source_filename: 'scan.pdf',
                    output_filename: '2021 - A - T.pdf',
                    mode: 'copy',
                },
            });

            expect(result.success).toBe(true);
        });

        it('should reject entries missing required fields', () => {
            expect(MetadataRecordSchema.safeParse({ title: 'T' }).success).toBe(false);
        });
    });
});
