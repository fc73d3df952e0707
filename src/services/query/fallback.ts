import type { EntityIndexEntry } from '../../domain/types.js';

/** Keyword answer over the patient's first document, used when the model is unavailable. */
export function keywordFallbackAnswer(query: string, entries: EntityIndexEntry[]): string {
  const lowered = query.toLowerCase();
  const entry = entries[0];

  if (entry) {
    if (lowered.includes('decline')) {
      return entry.declinedItems.length > 0
        ? `Based on your consent form, you declined: ${entry.declinedItems.join(', ')}`
        : "Based on your consent form, you didn't decline any items.";
    }

    if (lowered.includes('consent') || lowered.includes('agree')) {
      return entry.consentedItems.length > 0
        ? `Based on your consent form, you consented to: ${entry.consentedItems.join(', ')}`
        : 'Based on your consent form, no specific consent items were listed.';
    }
  }

  return "I found your consent form but couldn't extract specific information. Please contact your healthcare provider for details.";
}
