import type {
  DocumentMetadata,
  DocumentOverview,
  LearningPlan,
  Passage,
  PlanProvenance,
  Topic,
} from '../../types/learningPlan';
import { PlanAssemblyError } from '../../utils/errors';

/**
 * Combine topics with their ranked passages. Every topic must have an entry
 * in `passagesByTopic` (an empty list is fine).
 */
export function assemblePlan(
  documentMeta: DocumentMetadata,
  topics: Topic[],
  passagesByTopic: ReadonlyMap<string, Passage[]>,
  provenance?: PlanProvenance,
  overview?: DocumentOverview,
): LearningPlan {
  const plannedTopics = topics.map((topic) => {
    const passages = passagesByTopic.get(topic.id);
    if (!passages) {
      throw new PlanAssemblyError(`No passages entry for topic "${topic.title}" (${topic.id})`);
    }
    return { ...topic, passages: [...passages] };
  });

  return {
    schemaVersion: 1,
    document: { ...documentMeta },
    topics: plannedTopics,
    ...(overview ? { overview } : {}),
    ...(provenance ? { provenance } : {}),
  };
}
