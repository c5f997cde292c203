import { createHash } from 'node:crypto';
import Redis from 'ioredis';
import type { LearningPlan } from '../../types/learningPlan';
import { logger } from '../../utils/logger';
import { learningPlanSchema } from './plan.schema';

const KEY_PREFIX = 'plan:';

export interface PlanCache {
  get(key: string): Promise<LearningPlan | null>;
  set(key: string, plan: LearningPlan): Promise<void>;
}

/**
 * JSON with object keys sorted at every level, so equal configs hash equally.
 */
export function canonicalJson(value: unknown): string {
  if (Array.isArray(value)) {
    return `[${value.map(canonicalJson).join(',')}]`;
  }
  if (typeof value === 'object' && value !== null) {
    const entries = Object.entries(value)
      .filter(([, v]) => v !== undefined)
      .sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0))
      .map(([k, v]) => `${JSON.stringify(k)}:${canonicalJson(v)}`);
    return `{${entries.join(',')}}`;
  }
  return JSON.stringify(value) ?? 'null';
}

/**
 * Same document bytes and same plan-affecting configuration give the same key.
 */
export function computePlanCacheKey(text: string, config: unknown): string {
  return createHash('sha256')
    .update(text)
    .update('\0')
    .update(canonicalJson(config))
    .digest('hex');
}

export function parseStoredPlan(raw: string): LearningPlan | null {
  let data: unknown;
  try {
    data = JSON.parse(raw);
  } catch (error) {
    logger.warn({ error }, 'Stored plan is not valid JSON');
    return null;
  }
  const parsed = learningPlanSchema.safeParse(data);
  if (!parsed.success) {
    logger.warn({ issues: parsed.error.issues.length }, 'Stored plan failed validation');
    return null;
  }
  return parsed.data;
}

export class MemoryPlanCache implements PlanCache {
  private entries = new Map<string, string>();

  async get(key: string): Promise<LearningPlan | null> {
    const raw = this.entries.get(key);
    return raw ? parseStoredPlan(raw) : null;
  }

  async set(key: string, plan: LearningPlan): Promise<void> {
    this.entries.set(key, JSON.stringify(plan));
  }

  get size(): number {
    return this.entries.size;
  }
}

/**
 * The subset of an ioredis client the plan cache uses.
 */
export interface RedisLike {
  get(key: string): Promise<string | null>;
  set(key: string, value: string, mode: 'EX', seconds: number): Promise<unknown>;
}

/**
 * Redis-backed cache. Failures are logged and treated as misses so a cache
 * outage never fails a run.
 */
export class RedisPlanCache implements PlanCache {
  constructor(
    private client: RedisLike,
    private ttlSeconds: number,
  ) {}

  private key(cacheKey: string): string {
    return `${KEY_PREFIX}${cacheKey}`;
  }

  async get(key: string): Promise<LearningPlan | null> {
    try {
      const cached = await this.client.get(this.key(key));
      if (!cached) return null;
      logger.debug({ key }, 'Cache hit for plan');
      return parseStoredPlan(cached);
    } catch (error) {
      logger.error({ error, key }, 'Failed to get cached plan');
      return null;
    }
  }

  async set(key: string, plan: LearningPlan): Promise<void> {
    try {
      await this.client.set(this.key(key), JSON.stringify(plan), 'EX', this.ttlSeconds);
      logger.debug({ key, ttl: this.ttlSeconds }, 'Cached plan');
    } catch (error) {
      logger.error({ error, key }, 'Failed to cache plan');
    }
  }
}

export function createRedisPlanCache(redisUrl: string, ttlSeconds: number): RedisPlanCache {
  const client = new Redis(redisUrl, {
    maxRetriesPerRequest: 3,
    enableReadyCheck: true,
    lazyConnect: true,
  });

  client.on('connect', () => {
    logger.info('Redis plan cache connected');
  });

  client.on('error', (error) => {
    logger.error({ error }, 'Redis plan cache error');
  });

  return new RedisPlanCache(client, ttlSeconds);
}
