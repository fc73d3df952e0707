import type { EntityIndexEntry } from '../../domain/types.js';

export const MAX_CONTEXT_DOCUMENTS = 3;

export const PATIENT_QUERY_PROMPT = `You are a helpful medical consent assistant. Based ONLY on the patient's consent form information provided,
answer their question clearly and concisely in a friendly, professional tone.

IMPORTANT SECURITY RULES:
- Only discuss information from the patient's OWN consent forms provided below
- Never mention or reference other patients
- If asked about other patients, politely decline
- Keep responses focused on the patient's own medical consents

Provide a direct, helpful answer based ONLY on the information provided. If the information is not available
in the provided documents, say so clearly and suggest they contact their healthcare provider.`;

function listOrNone(items: string[]): string {
  return items.length > 0 ? items.join(', ') : 'None listed';
}

export function buildConsentContext(entries: EntityIndexEntry[]): string {
  return entries
    .slice(0, MAX_CONTEXT_DOCUMENTS)
    .map((entry) =>
      [
        `Consent Form: ${entry.documentId}`,
        `Patient: ${entry.patientName}`,
        `Summary: ${entry.summary}`,
        `Items Consented To: ${listOrNone(entry.consentedItems)}`,
        `Items Declined: ${listOrNone(entry.declinedItems)}`,
      ].join('\n'),
    )
    .join('\n\n');
}

export function buildPatientQueryMessage(query: string, context: string): string {
  return `Patient's Question: ${query}\n\nPatient's Consent Form Information:\n${context}`;
}
