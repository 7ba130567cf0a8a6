/**
 * @module sql
 * @description Structural SQL extraction and its run-scoped cache
 * @status COMPLETE
 * @dependencies src/sql/structure-extractor.ts, src/sql/structural-cache.ts
 */

export { SqlStructureExtractor } from './structure-extractor';
export { StructuralCache, type StructuralCacheStats } from './structural-cache';
export { normalizeQuery } from './normalizer';
export { scanSql, type ScannedSql } from './scanner';
export {
  assessInjectionRisk,
  isSuspiciousLiteral,
  isSuspiciousNumeric,
  INJECTION_INDICATORS,
  type InjectionAssessment,
  type InjectionRiskLevel,
} from './injection';
