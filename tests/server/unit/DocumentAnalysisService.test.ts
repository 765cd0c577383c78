import { describe, it, expect } from 'vitest';
import { DocumentAnalysisService } from '../../../src/server/services/analysis/DocumentAnalysisService.js';
import { DocumentRegistry } from '../../../src/server/services/analysis/DocumentRegistry.js';
import { ChatLedger } from '../../../src/server/services/analysis/ChatLedger.js';
import { PromptComposer } from '../../../src/server/services/analysis/PromptComposer.js';
import { DEFAULT_ANALYSIS_CONFIG } from '../../../src/server/services/analysis/types.js';
import { AiServiceError, EmptyInputError, MissingContextError } from '../../../src/server/types/errors.js';
import { FakeProvider, RENT_ANALYSIS, RENT_ANSWER, RENT_TEXT } from '../helpers/FakeProvider.js';

const NOW = new Date('2024-05-01T12:00:00.000Z');

function setup(options: { composer?: PromptComposer } = {}) {
  const provider = new FakeProvider();
  const service = new DocumentAnalysisService({
    provider,
    registry: new DocumentRegistry(() => 'doc-1'),
    ledger: new ChatLedger(),
    composer: options.composer,
    now: () => NOW,
  });
  return { provider, service };
}

describe('DocumentAnalysisService', () => {
  it('analyzes a rental agreement and answers a follow-up question from it', async () => {
    const { provider, service } = setup();
    provider.queue(RENT_ANALYSIS, RENT_ANSWER);

    const analysis = await service.analyzeDocument(RENT_TEXT, {
      documentType: 'rental_agreement',
      userRole: 'tenant',
      complexityLevel: 'simple',
    });

    expect(analysis).toEqual({ document_id: 'doc-1', ...JSON.parse(RENT_ANALYSIS) });
    expect(provider.prompts[0]).toContain('helping someone looking to rent property understand a rental agreement.');
    expect(provider.prompts[0]).toContain(`DOCUMENT TEXT:\n${RENT_TEXT}\n`);

    const answer = await service.askQuestion('When is rent due?', { documentId: analysis.document_id });

    expect(answer.answer).toContain('1st');
    expect(answer.confidence_level).toBe('high');
    expect(provider.prompts[1]).toContain(`DOCUMENT TEXT:\n${RENT_TEXT}\n`);
    expect(provider.prompts[1]).toContain('USER QUESTION:\nWhen is rent due?\n');

    expect(service.listChatHistory()).toEqual([
      { question: 'When is rent due?', ...answer, timestamp: '2024-05-01T12:00:00.000Z' },
    ]);
  });

  it('returns a fully typed analysis when the AI answers with prose', async () => {
    const { provider, service } = setup();
    provider.queue('I cannot process this.');

    const analysis = await service.analyzeDocument('Some contract text.');

    expect(analysis).toEqual({
      document_id: 'doc-1',
      summary: 'The analysis could not be structured automatically. Raw response: "I cannot process this."',
      key_points: [],
      risks_and_concerns: [],
      recommendations: [],
      simplified_explanation: 'The AI service returned a response that could not be parsed: I cannot process this.',
    });
    expect(service.getStats()).toEqual({ documents: 1, chatEntries: 0 });
  });

  it('fills missing options with defaults', async () => {
    const { provider, service } = setup();
    provider.queue(RENT_ANALYSIS);

    await service.analyzeDocument('Some terms.', { documentType: undefined, userRole: 'business' });

    expect(service.getDocument('doc-1').config).toEqual({ ...DEFAULT_ANALYSIS_CONFIG, userRole: 'business' });
    expect(provider.prompts[0]).toContain('helping a small business owner understand a contract.');
  });

  it('stores the normalized text in full even past the prompt limit', async () => {
    const { provider, service } = setup({ composer: new PromptComposer({ analysisTextLimit: 100 }) });
    provider.queue(RENT_ANALYSIS);

    await service.analyzeDocument(`  ${'x'.repeat(150)}\r\n`);

    expect(service.getDocument('doc-1').text).toBe('x'.repeat(150));
    expect(provider.prompts[0]).toContain('[Document truncated: showing the first 100 of 150 characters]');
  });

  it('rejects blank text before calling the AI service', async () => {
    const { provider, service } = setup();

    await expect(service.analyzeDocument(' \n ')).rejects.toThrow(EmptyInputError);
    await expect(service.analyzeDocument('')).rejects.toThrow('Document text is required');
    expect(provider.prompts).toHaveLength(0);
  });

  it('rejects a blank question', async () => {
    const { service } = setup();

    await expect(service.askQuestion('   ', { documentText: 'Text' })).rejects.toThrow('Question is required');
  });

  it('fails for an unknown document id and records nothing', async () => {
    const { provider, service } = setup();

    await expect(service.askQuestion('When is rent due?', { documentId: 'unknown-id' }))
      .rejects.toBeInstanceOf(MissingContextError);
    expect(provider.prompts).toHaveLength(0);
    expect(service.listChatHistory()).toEqual([]);
  });

  it('answers from supplied text without storing a document', async () => {
    const { provider, service } = setup();
    provider.queue(RENT_ANSWER);

    const answer = await service.askQuestion('When is rent due?', { documentText: RENT_TEXT });

    expect(answer.relevant_sections).toEqual([RENT_TEXT]);
    expect(service.getStats()).toEqual({ documents: 0, chatEntries: 1 });
  });

  it('sends a capped question but records it in full', async () => {
    const { provider, service } = setup({ composer: new PromptComposer({ questionLengthLimit: 10 }) });
    provider.queue(RENT_ANSWER);
    const question = 'When is rent due each month?';

    await service.askQuestion(question, { documentText: RENT_TEXT });

    expect(provider.prompts[0]).toContain(
      'USER QUESTION:\nWhen is re\n[Question truncated: showing the first 10 of 28 characters]\n'
    );
    expect(service.listChatHistory()[0]?.question).toBe(question);
  });

  it('propagates AI service failures without storing anything', async () => {
    const { provider, service } = setup();
    const failure = new AiServiceError(429, 'quota exceeded');
    provider.queue(failure);

    await expect(service.analyzeDocument(RENT_TEXT)).rejects.toBe(failure);
    expect(service.getStats()).toEqual({ documents: 0, chatEntries: 0 });
  });

  it('appends, lists and clears chat history', () => {
    const { service } = setup();

    const entry = service.appendChat({
      question: 'Can I sublet?',
      answer: 'Not without written consent.',
      relevant_sections: [],
      confidence_level: 'medium',
    });
    service.appendChat({ ...entry, question: 'Second', timestamp: '2024-06-01T00:00:00.000Z' });

    expect(entry.timestamp).toBe('2024-05-01T12:00:00.000Z');
    expect(service.listChatHistory().map(item => item.question)).toEqual(['Can I sublet?', 'Second']);

    service.clearChatHistory();
    expect(service.listChatHistory()).toEqual([]);
  });

  it('reports whether the AI service is configured', async () => {
    const service = new DocumentAnalysisService({ provider: new FakeProvider(false) });

    await expect(service.isAiConfigured()).resolves.toBe(false);
  });
});
