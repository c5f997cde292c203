export { extractTopicsPrompt } from './extractTopics';
export { judgeRelevancePrompt } from './judgeRelevance';
export { summarizeDocumentPrompt } from './summarizeDocument';
