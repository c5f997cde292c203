/**
 * Whole-document overview built from the opening of each accepted section.
 */

import type { PromptDefinition } from '../types';

interface SummarizeDocumentInput {
  documentTitle: string;
  sections: Array<{ title: string; excerpt: string }>;
  totalSections: number;
}

export const summarizeDocumentPrompt: PromptDefinition<SummarizeDocumentInput> = {
  id: 'summarize-document-v1',
  version: 1,
  description: 'Summarize a sectioned document and describe each section',
  temperature: 0.4,
  maxTokens: 8000,
  systemMessage:
    'You are an expert educator. You respond with valid JSON only, never with prose or markdown.',

  build: ({ documentTitle, sections, totalSections }) => {
    const listing = sections
      .map((section, i) => `Section ${i + 1}: ${section.title}\n${section.excerpt}...`)
      .join('\n\n');

    return `Analyze the document "${documentTitle}" and provide a structured overview.

Sections:
${listing}

Return:
1. summary: 2-3 sentences about the whole document
2. sections: one object per section above, with
   - number: the section number
   - title: the section title
   - description: 1-2 sentences about what the section covers
   - keyConcepts: 3-5 main concepts (array of strings)

CRITICAL INSTRUCTIONS:
- Respond with ONLY a JSON object
- The document has ${totalSections} sections in total
- No explanations, no markdown fences

Format:
{
  "summary": "...",
  "sections": [
    {
      "number": 1,
      "title": "...",
      "description": "...",
      "keyConcepts": ["concept", "another concept"]
    }
  ]
}`;
  },
};
