/**
 * Topic extraction for a single unit of a larger document.
 *
 * Each unit is analyzed on its own; candidates from all units are merged
 * afterwards, so the prompt asks only for topics this unit actually covers.
 */

import type { PromptDefinition } from '../types';

interface ExtractTopicsInput {
  unitText: string;
  unitIndex: number;
  totalUnits: number;
  documentTitle: string;
  unitTitle?: string;
  topicRange: { min: number; max: number };
}

export const extractTopicsPrompt: PromptDefinition<ExtractTopicsInput> = {
  id: 'extract-unit-topics-v1',
  version: 1,
  description: 'Extract candidate learning topics from one unit of a document',
  temperature: 0.3,
  maxTokens: 4000,
  systemMessage:
    'You are an expert educator. You respond with valid JSON only, never with prose or markdown.',

  build: ({ unitText, unitIndex, totalUnits, documentTitle, unitTitle, topicRange }) => {
    const location = unitTitle
      ? `section "${unitTitle}" (part ${unitIndex + 1} of ${totalUnits})`
      : `part ${unitIndex + 1} of ${totalUnits}`;

    return `You are analyzing ${location} of the document "${documentTitle}".

Identify the key learning topics a student should understand from THIS part of the document.
The whole document will yield ${topicRange.min}-${topicRange.max} topics in total, so only list
topics that this part covers substantially. For each topic:
1. A clear, concise title
2. A brief description (1-2 sentences) of what it covers
3. Importance: "High", "Medium" or "Low"
4. A few keywords that appear in the text and identify the topic

CRITICAL INSTRUCTIONS:
- Respond with ONLY a JSON array
- Start your response with [ and end with ]
- No explanations, no markdown fences

Format:
[
  {
    "title": "Topic Title",
    "description": "What this topic covers",
    "importance": "High",
    "keywords": ["keyword", "another keyword"]
  }
]

Text:
${unitText}`;
  },
};
