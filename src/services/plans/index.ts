export { assemblePlan } from './plan.assembler';
export {
  MemoryPlanCache,
  RedisPlanCache,
  createRedisPlanCache,
  computePlanCacheKey,
  canonicalJson,
  parseStoredPlan,
} from './plan.cache';
export type { PlanCache, RedisLike } from './plan.cache';
export { FilePlanStore } from './plan.store';
export { learningPlanSchema } from './plan.schema';
