/**
 * @module analyzer/context
 * @description Run-scoped state handed to every analyzer call
 * @status COMPLETE
 * @dependencies src/sql/structural-cache.ts, src/metadata/cached-provider.ts
 */

import { CachedMetadataProvider } from '../metadata/cached-provider';
import { StructuralCache } from '../sql/structural-cache';
import type { Logger } from '../types/common';
import type { EntityMetadataProvider } from '../types/metadata';

/**
 * Everything an analyzer may share with the others during one run.
 * Created per run so that no cache outlives its trace.
 */
export interface AnalysisContext {
  cache: StructuralCache;
  /** Null when no metadata collaborator was supplied */
  metadata: CachedMetadataProvider | null;
  logger?: Logger;
}

export interface AnalysisContextOptions {
  metadata?: EntityMetadataProvider | null;
  logger?: Logger;
  cache?: StructuralCache;
}

export function createAnalysisContext(options: AnalysisContextOptions = {}): AnalysisContext {
  const metadata = options.metadata
    ? options.metadata instanceof CachedMetadataProvider
      ? options.metadata
      : new CachedMetadataProvider(options.metadata, options.logger)
    : null;

  return {
    cache: options.cache ?? new StructuralCache(),
    metadata,
    logger: options.logger,
  };
}
