/**
 * @module metadata
 * @description Entity metadata providers
 * @status COMPLETE
 * @dependencies src/metadata/static-provider.ts, src/metadata/cached-provider.ts
 */

export {
  StaticMetadataProvider,
  metadataDocumentSchema,
  type MetadataDocument,
  type TableMetadata,
} from './static-provider';
export { CachedMetadataProvider } from './cached-provider';
