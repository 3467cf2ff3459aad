import { z } from 'zod';
import type { AuthorField } from '../types/metadata.types.js';

const ScalarValueSchema = z.union([z.string(), z.number()]).transform((value) => String(value));

/**
 * Scalar metadata value. Numbers ("year": 2021) are accepted as strings;
 * null and values of any other type count as a missing field.
 */
const ScalarFieldSchema = ScalarValueSchema.nullish().catch(undefined);

function keepScalarValues(values: readonly unknown[]): string[] {
    return values.flatMap((value) => {
        const result = ScalarValueSchema.safeParse(value);
        return result.success ? [result.data] : [];
    });
}

/**
 * Author as returned by the model: one string, or a list of names.
 * List entries that are not names (null, objects) are dropped; any other
 * shape counts as a missing author.
 */
export const AuthorFieldSchema = z
    .union([
        ScalarValueSchema.transform((value): AuthorField => ({ kind: 'single', value })),
        z.array(z.unknown()).transform(
            (values): AuthorField => ({ kind: 'list', values: keepScalarValues(values) })
        ),
    ])
    .nullish()
    .catch(undefined);

/**
 * Metadata object the model is asked to return. Fields are checked one by
 * one, so a malformed field never discards the others.
 * `source_filename` is ignored: the caller knows the real filename.
 */
export const ModelMetadataSchema = z.object({
    title: ScalarFieldSchema,
    author: AuthorFieldSchema,
    year: ScalarFieldSchema,
});

export type ModelMetadata = z.infer<typeof ModelMetadataSchema>;

/**
 * Placement outcome as stored in the results file
 */
export const PlacementResultSchema = z.object({
    copied: z.boolean(),
    source_filename: z.string(),
    output_filename: z.string().optional(),
    source_path: z.string().optional(),
    output_path: z.string().optional(),
    mode: z.enum(['copy', 'move']).optional(),
    error: z.string().optional(),
});

/**
 * Metadata record as stored in the results file
 */
export const MetadataRecordSchema = z.object({
    title: z.string(),
    author: z.string(),
    authors: z.array(z.string()).optional(),
    year: z.string(),
    source_filename: z.string(),
    error: z.string().optional(),
    raw_response: z.string().optional(),
    parse_error: z.string().optional(),
    placement: PlacementResultSchema.optional(),
});
