import { describe, it, expect } from 'vitest';
import { ok, err } from '../../src/domain/result.js';
import { createAppError } from '../../src/domain/errors.js';
import {
  FALLBACK_ANALYSIS,
  parseConsentAnalysis,
  stripCodeFences,
  summarizeConsent,
} from '../../src/services/analysis/index.js';
import { createScriptedLlm, llmResponse } from '../helpers/in-memory.js';

const analysis = {
  summary: 'Consent for knee arthroscopy.',
  entities: {
    patient_name: 'Jane Roe',
    patient_email: 'Jane@Example.com',
    date_of_birth: '1990-02-03',
    doctor_name: 'Dr. Lee',
    procedure: 'Knee arthroscopy',
    date: '2024-05-01',
  },
  consented_items: ['anesthesia', 'photography'],
  declined_items: ['blood transfusion'],
  patient_id: 'jane@example.com',
};

describe('stripCodeFences', () => {
  it('removes every json and bare fence and trims', () => {
    expect(stripCodeFences('```json\n{"a":1}\n```\n')).toBe('{"a":1}');
    expect(stripCodeFences('  ```{"a":1}```  ')).toBe('{"a":1}');
  });
});

describe('parseConsentAnalysis', () => {
  it('rejects text that is not JSON', () => {
    const result = parseConsentAnalysis('Sure! Here is the analysis');
    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.error.code).toBe('LLM_MALFORMED_RESPONSE');
    }
  });

  it('rejects JSON that is not an object', () => {
    expect(parseConsentAnalysis('[1, 2]').ok).toBe(false);
  });
});

describe('summarizeConsent', () => {
  it('keeps the cleaned model text as the stored JSON', async () => {
    const raw = '```json\n' + JSON.stringify(analysis) + '\n```';
    const llm = createScriptedLlm(ok(llmResponse(raw)));

    const summary = await summarizeConsent(llm, 'full consent text', 'consent-42');

    expect(summary.usedFallback).toBe(false);
    expect(summary.analysisJson).toBe(JSON.stringify(analysis));
    expect(summary.analysis.declined_items).toEqual(['blood transfusion']);
    expect(summary.analysis.entities.patient_email).toBe('Jane@Example.com');
  });

  it('asks for JSON and embeds the OCR text', async () => {
    const llm = createScriptedLlm(ok(llmResponse(JSON.stringify(analysis))));

    await summarizeConsent(llm, 'I consent to anesthesia.', 'consent-42');

    const request = llm.chat.mock.calls[0]?.[0];
    expect(request?.responseFormat).toBe('json');
    expect(request?.userMessage).toBe('TEXT:\nI consent to anesthesia.');
    expect(request?.systemPrompt).toContain('"summary", "entities", "consented_items", "declined_items", "patient_id"');
    expect(request?.trace).toEqual({ id: 'consent-42', name: 'consent-analysis', metadata: { textLength: 24 } });
  });

  it('falls back when the model call fails', async () => {
    const llm = createScriptedLlm(err(createAppError('LLM_RATE_LIMITED', 'Groq API rate limited', true)));

    const summary = await summarizeConsent(llm, 'text', 'consent-42');

    expect(summary.usedFallback).toBe(true);
    expect(summary.failure?.code).toBe('LLM_RATE_LIMITED');
    expect(summary.analysis).toEqual(FALLBACK_ANALYSIS);
    expect(JSON.parse(summary.analysisJson)).toEqual({
      summary: 'Consent form processed - AI analysis failed',
      entities: {
        patient_name: 'N/A',
        patient_email: 'N/A',
        date_of_birth: 'N/A',
        doctor_name: 'N/A',
        procedure: 'N/A',
        date: 'N/A',
      },
      consented_items: ['Analysis pending'],
      declined_items: [],
      patient_id: 'unknown',
    });
  });

  it('falls back when the model answers with prose', async () => {
    const llm = createScriptedLlm(ok(llmResponse('I could not read this form.')));

    const summary = await summarizeConsent(llm, 'text', 'consent-42');

    expect(summary.usedFallback).toBe(true);
    expect(summary.analysisJson).toBe(JSON.stringify(FALLBACK_ANALYSIS));
  });

  it('falls back when the JSON has the wrong shape', async () => {
    const llm = createScriptedLlm(ok(llmResponse('{"consented_items": "all of it"}')));

    const summary = await summarizeConsent(llm, 'text', 'consent-42');

    expect(summary.usedFallback).toBe(true);
    expect(summary.failure?.code).toBe('LLM_MALFORMED_RESPONSE');
  });
});
