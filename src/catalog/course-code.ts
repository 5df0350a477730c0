const COURSE_CODE_PATTERN = /\b([A-Za-z]{2,4})\s?(\d{3})\b/g;

// Short words that precede numbers in ordinary questions ("top 100", "over 200").
const NOT_SUBJECTS: ReadonlySet<string> = new Set([
  'AT', 'BY', 'IN', 'IS', 'OF', 'ON', 'OR', 'TO', 'AND', 'ARE', 'FOR', 'THE', 'TOP',
  'OVER', 'ROOM', 'FROM', 'WITH',
]);

/**
 * First course code in `text`, normalized to "SUBJ 123", or null.
 *
 * @example
 * extractCourseCode('prereqs for cmpe259?') // => 'CMPE 259'
 */
export function extractCourseCode(text: string): string | null {
  for (const match of text.matchAll(COURSE_CODE_PATTERN)) {
    const subject = match[1].toUpperCase();
    if (!NOT_SUBJECTS.has(subject)) {
      return `${subject} ${match[2]}`;
    }
  }
  return null;
}
