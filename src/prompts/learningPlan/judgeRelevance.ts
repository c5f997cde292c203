import type { PromptDefinition } from '../types';

interface JudgeRelevanceInput {
  topicTitle: string;
  topicDescription: string;
  passageText: string;
}

export const judgeRelevancePrompt: PromptDefinition<JudgeRelevanceInput> = {
  id: 'judge-passage-relevance-v1',
  version: 1,
  description: 'Score how relevant one passage is to a learning topic',
  temperature: 0.1,
  maxTokens: 20,

  build: ({ topicTitle, topicDescription, passageText }) => `Topic: ${topicTitle}
Description: ${topicDescription}

Passage:
${passageText}

How useful is this passage for teaching the topic? A passage is relevant if it
explains the topic's concepts, gives examples or practical applications, or
covers background needed to understand it.

Respond with ONLY a single integer from 0 (unrelated) to 10 (directly teaches the topic).`,
};
