// Letters and digits of any script, so accented names survive extraction.
const WORD = String.raw`([\p{L}\p{N}_]+)`;

/** Tried in order against the lowercased question; the first capture wins. */
export const ENTITY_PATTERNS: readonly RegExp[] = [
  new RegExp(String.raw`patient\s+${WORD}`, 'u'),
  new RegExp(String.raw`${WORD}\s+declined`, 'u'),
  new RegExp(String.raw`${WORD}\s+consented`, 'u'),
  new RegExp(String.raw`what\s+did\s+${WORD}`, 'u'),
  new RegExp(String.raw`${WORD}\s+patient`, 'u'),
];

export function extractKeyEntity(question: string): string | null {
  const lowered = question.toLowerCase();
  for (const pattern of ENTITY_PATTERNS) {
    const match = pattern.exec(lowered);
    if (match?.[1]) return match[1];
  }
  return null;
}
