/**
 * @fileoverview Small-talk detection for the grounding rule.
 *
 * A final answer without any tool observation is only acceptable for
 * conversational messages; anything that asks about the university must be
 * looked up first.
 *
 * @module campus-guide/agent/query-classifier
 */

export type QueryClass = 'small_talk' | 'substantive';

const SMALL_TALK_PATTERNS: ReadonlyArray<RegExp> = [
  /^(hi|hello|hey|hiya|howdy|greetings|yo)\b/,
  /^good (morning|afternoon|evening|night)\b/,
  /^(thanks|thank you|thx|ty|cheers|much appreciated)\b/,
  /^(bye|goodbye|see you|see ya|later|take care)\b/,
  /^(ok|okay|cool|great|nice|awesome|got it|sounds good)\b/,
  /^how are you\b/,
  /^who are you\b/,
  /^what are you\b/,
  /^what can you do\b/,
  /^what is your name\b/,
];

// Words that make a message a real question even inside a greeting.
const DOMAIN_KEYWORDS: ReadonlyArray<string> = [
  'course', 'class', 'prerequisite', 'prereq', 'program', 'degree', 'major', 'minor',
  'deadline', 'apply', 'application', 'admission', 'enroll', 'register', 'registration',
  'tuition', 'fee', 'financial', 'scholarship', 'office', 'library', 'housing', 'parking',
  'advisor', 'advising', 'semester', 'exam', 'graduate', 'undergraduate', 'transcript',
  'campus', 'where', 'when',
];

const COURSE_CODE = /\b[a-z]{2,4}\s?\d{3}\b/;

function normalize(text: string): string {
  return text
    .toLowerCase()
    .replace(/[^a-z0-9\s']/g, ' ')
    .replace(/\s+/g, ' ')
    .trim();
}

/**
 * Classifies a user query as conversational small talk or a substantive
 * question that needs a tool observation before it can be answered.
 */
export function classifyQuery(text: string): QueryClass {
  const normalized = normalize(text);

  if (normalized.length === 0) {
    return 'small_talk';
  }

  if (COURSE_CODE.test(normalized)) {
    return 'substantive';
  }

  const words = new Set(normalized.split(' '));
  const mentionsDomain = DOMAIN_KEYWORDS.some(keyword =>
    words.has(keyword) || words.has(`${keyword}s`));
  if (mentionsDomain) {
    return 'substantive';
  }

  return SMALL_TALK_PATTERNS.some(pattern => pattern.test(normalized))
    ? 'small_talk'
    : 'substantive';
}
