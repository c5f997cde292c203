export {
  rankPassages,
  rankByKeywords,
  splitPassages,
  buildTopicContext,
} from './passage.ranker';
export type { RankOptions, PassageSplitOptions } from './passage.ranker';
export { extractKeywords, topicKeywords, keywordScore, countOccurrences } from './keywords';
export { parseRelevanceScore, MAX_RELEVANCE_SCORE } from './relevance';
