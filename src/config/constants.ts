// Topic unit sizing (characters). Roughly 2457 words at ~6 chars/word.
const DEFAULT_UNIT_SIZE = 14742;
const DEFAULT_UNIT_OVERLAP = 1470;
const DEFAULT_SEPARATOR = '\n\n';

// Passage sizing for relevance ranking
const DEFAULT_PASSAGE_SIZE = 1000;
const DEFAULT_PASSAGE_OVERLAP_RATIO = 0.2;

// Section detection
const SECTION_BAND_MIN = 3;
const SECTION_BAND_MAX = 20;
const MIN_SECTION_WORDS = 100;
const MAX_HEADING_LENGTH = 100;

// Topic bounds
const TOPIC_TARGET_MIN = 8;
const TOPIC_TARGET_MAX = 15;
const DEFAULT_TOP_K = 5;

// Completion-assisted ranking only judges this many keyword-prefiltered passages
const MAX_JUDGED_PASSAGES = 50;

// Completion calls
const DEFAULT_COMPLETION_TIMEOUT_MS = 600_000;
const MAX_RETRIES = 3;
const RETRY_DELAYS = [1000, 2000, 4000];

// Document overview: the first sections, each cut to an excerpt
const OVERVIEW_SECTION_LIMIT = 10;
const OVERVIEW_EXCERPT_CHARS = 500;

// Context assembly for downstream prompts
const DEFAULT_CONTEXT_WORDS = 3000;

export {
  DEFAULT_UNIT_SIZE,
  DEFAULT_UNIT_OVERLAP,
  DEFAULT_SEPARATOR,
  DEFAULT_PASSAGE_SIZE,
  DEFAULT_PASSAGE_OVERLAP_RATIO,
  SECTION_BAND_MIN,
  SECTION_BAND_MAX,
  MIN_SECTION_WORDS,
  MAX_HEADING_LENGTH,
  TOPIC_TARGET_MIN,
  TOPIC_TARGET_MAX,
  DEFAULT_TOP_K,
  MAX_JUDGED_PASSAGES,
  DEFAULT_COMPLETION_TIMEOUT_MS,
  MAX_RETRIES,
  RETRY_DELAYS,
  OVERVIEW_SECTION_LIMIT,
  OVERVIEW_EXCERPT_CHARS,
  DEFAULT_CONTEXT_WORDS,
};
