#!/usr/bin/env node
import { readFile } from 'node:fs/promises';
import { basename } from 'node:path';
import { parseArgs } from 'node:util';
import { env } from '../config/env';
import { getCompletionProvider } from '../services/completion';
import { createDocument } from '../services/documents';
import { learningPlanPipeline } from '../services/pipeline';
import { FilePlanStore, type PlanCache, createRedisPlanCache } from '../services/plans';
import { logger } from '../utils/logger';

const USAGE = `Usage: process-document <file.txt> [options]

Options:
  --title <title>          Document title (default: file name)
  --author <name>          Document author
  --toc <file>             Table of contents to segment by
  --strategy <name>        Passage ranking: keyword | completion (default: keyword)
  --top-k <n>              Passages per topic (default: 5)
  --no-sections            Skip chapter detection and always split
  --no-overview            Skip the section overview
  -h, --help               Show this help`;

function parseStrategy(value: string | undefined): 'keyword' | 'completion' | undefined {
  if (value === undefined || value === 'keyword' || value === 'completion') return value;
  console.error(`Unknown ranking strategy: ${value}`);
  process.exit(1);
}

async function processDocument() {
  const { values, positionals } = parseArgs({
    allowPositionals: true,
    options: {
      title: { type: 'string' },
      author: { type: 'string' },
      toc: { type: 'string' },
      strategy: { type: 'string' },
      'top-k': { type: 'string' },
      'no-sections': { type: 'boolean', default: false },
      'no-overview': { type: 'boolean', default: false },
      help: { type: 'boolean', short: 'h', default: false },
    },
  });

  const [file] = positionals;
  if (values.help || !file) {
    console.log(USAGE);
    process.exit(values.help ? 0 : 1);
  }

  const text = await readFile(file, 'utf-8');
  const tocText = values.toc ? await readFile(values.toc, 'utf-8') : undefined;
  const document = createDocument({
    text,
    title: values.title,
    author: values.author,
    sourceName: basename(file),
  });

  const store = new FilePlanStore(env.PLAN_STORE_DIR);
  const cache: PlanCache = env.REDIS_URL
    ? createRedisPlanCache(env.REDIS_URL, env.PLAN_CACHE_TTL)
    : store;

  const controller = new AbortController();
  process.once('SIGINT', () => {
    logger.warn('SIGINT received, finishing in-flight units and saving a partial plan');
    controller.abort();
  });

  const result = await learningPlanPipeline.run(document, {
    completion: getCompletionProvider(),
    cache,
    signal: controller.signal,
    config: {
      tocText,
      useSections: !values['no-sections'],
      overview: !values['no-overview'],
      rankingStrategy: parseStrategy(values.strategy),
      topK: values['top-k'] ? Number(values['top-k']) : undefined,
    },
    onProgress: (progress) => {
      const units =
        progress.totalUnits !== undefined
          ? ` (${progress.completedUnits}/${progress.totalUnits})`
          : '';
      console.log(`${progress.statusHint}${units}`);
    },
  });

  // Partial plans never land under the cache key
  const storeKey = result.partial ? `${result.cacheKey}-partial` : result.cacheKey;
  if (cache !== store || result.partial) {
    await store.set(storeKey, result.plan);
  }

  const { plan } = result;
  console.log(`\n${plan.document.title}: ${plan.topics.length} topics${result.cacheHit ? ' (cached)' : ''}`);
  if (plan.overview) {
    console.log(`\n${plan.overview.summary}\n`);
  }
  for (const topic of plan.topics) {
    console.log(`  ${topic.ordinal}. [${topic.importance}] ${topic.title} - ${topic.passages.length} passages`);
  }
  if (result.partial) {
    console.log('\nPartial plan: some units failed or the run was cancelled.');
  }
  console.log(`\nSaved to ${store.pathFor(storeKey)}`);
}

processDocument()
  .then(() => process.exit(0))
  .catch((error) => {
    console.error('Error processing document:', error instanceof Error ? error.message : error);
    process.exit(1);
  });
