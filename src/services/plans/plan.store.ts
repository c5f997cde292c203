import { mkdir, readFile, rename, writeFile } from 'node:fs/promises';
import { join } from 'node:path';
import type { LearningPlan } from '../../types/learningPlan';
import { logger } from '../../utils/logger';
import type { PlanCache } from './plan.cache';
import { parseStoredPlan } from './plan.cache';

function isMissingFile(error: unknown): boolean {
  return typeof error === 'object' && error !== null && 'code' in error && error.code === 'ENOENT';
}

/**
 * One JSON file per plan, rewritten wholesale on every save.
 */
export class FilePlanStore implements PlanCache {
  constructor(private directory: string) {}

  pathFor(key: string): string {
    return join(this.directory, `${key}.json`);
  }

  async get(key: string): Promise<LearningPlan | null> {
    let raw: string;
    try {
      raw = await readFile(this.pathFor(key), 'utf-8');
    } catch (error) {
      if (isMissingFile(error)) return null;
      throw error;
    }
    return parseStoredPlan(raw);
  }

  async set(key: string, plan: LearningPlan): Promise<void> {
    await mkdir(this.directory, { recursive: true });
    const target = this.pathFor(key);
    const temp = `${target}.${process.pid}.tmp`;
    await writeFile(temp, JSON.stringify(plan, null, 2), 'utf-8');
    await rename(temp, target);
    logger.info({ path: target, topics: plan.topics.length }, 'Saved learning plan');
  }
}
