export { extract, extractTopics, temperatureForAttempt } from './topic.orchestrator';
export type {
  ExtractionOptions,
  ExtractionResult,
  UnitProgress,
  UnitStatus,
} from './topic.orchestrator';
export { parseTopicResponse, repairJson, stripCodeFences, normalizeImportance } from './topic.parser';
export type { ParseResult } from './topic.parser';
export { mergeTopics, groupCandidates, topicId } from './topic.merger';
export { normalizeTitle, titlesMatch, editSimilarity } from './titleSimilarity';
