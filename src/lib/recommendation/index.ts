/**
 * @fileoverview Recommendation Barrel Export
 *
 * @module lib/recommendation
 */

export {
  RecommendationEngine,
  DEFAULT_POOL_SIZE,
  type RecommendationEngineDeps,
  type Recommendations,
  type AsyncRecommendations,
  type AsyncRecommendationType,
  type SplitPools,
  type DeleteOrderResult,
  type RecommendFilters,
  type RecommendOptions,
  type RecommendationPage,
} from "./engine"
export {
  PoolBuilder,
  POOL_RATIOS,
  type PoolBuildResult,
  type PoolStatus,
  type ScrollState,
} from "./pool"
export {
  RecommendationUpdater,
  type UpdateStats,
  type EventUpdateResult,
} from "./update"
