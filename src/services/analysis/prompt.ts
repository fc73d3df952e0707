export const CONSENT_ANALYSIS_PROMPT = `Analyze the following medical consent form text and respond ONLY with a valid JSON object.
The JSON object should have these exact keys: "summary", "entities", "consented_items", "declined_items", "patient_id".

- "summary": A brief, one-paragraph summary of the document's purpose.
- "entities": An object containing key entities like "patient_name", "patient_email", "date_of_birth", "doctor_name", "procedure", and "date". If a value is not found, use "N/A".
- "consented_items": A list of strings, where each string is a specific item the patient consented to.
- "declined_items": A list of strings, where each string is a specific item the patient declined.
- "patient_id": Extract or generate a unique identifier for the patient (e.g., email, patient number, or combination of name and DOB). This is critical for patient-specific access.

IMPORTANT: Extract patient identification information carefully as it will be used for authentication and authorization.`;

export function buildConsentTextMessage(fullText: string): string {
  return `TEXT:\n${fullText}`;
}
