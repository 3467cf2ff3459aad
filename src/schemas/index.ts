export {
    ModelMetadataSchema,
    AuthorFieldSchema,
    MetadataRecordSchema,
    PlacementResultSchema,
    type ModelMetadata,
} from './metadata.schema.js';
