// ============================================================
// Technical Indicators
// ============================================================

export { IndicatorEngine, resolveParams, minBarsFor, latestValue, requireLatest } from './engine'
export type { SnapshotBuild, SnapshotFailure } from './engine'
export { IndicatorResultCache, buildCacheKey, DEFAULT_CACHE_SIZE } from './cache'
export type { CacheStats } from './cache'
export * from './series'
export { INDICATOR_FIELDS, DEFAULT_PARAMS, isIndicatorType } from './types'
export type {
  Bar,
  IndicatorType,
  IndicatorParams,
  IndicatorConfig,
  IndicatorSeries,
  IndicatorResult,
  CacheContext,
  IndicatorDefinition,
  IndicatorSnapshot,
} from './types'
