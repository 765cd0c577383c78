import type { LLMGenerateOptions, LLMMessage, LLMProvider, LLMResponse } from '../../../src/server/services/llm/LLMProvider.js';

/**
 * In-process LLMProvider: replays queued completions (or errors) in order and
 * records every prompt it receives.
 */
export class FakeProvider implements LLMProvider {
  readonly prompts: string[] = [];
  private readonly replies: Array<string | Error> = [];

  constructor(private readonly available = true) {}

  queue(...replies: Array<string | Error>): this {
    this.replies.push(...replies);
    return this;
  }

  async generate(messages: LLMMessage[], _options?: LLMGenerateOptions): Promise<LLMResponse> {
    this.prompts.push(messages.map(message => message.content).join('\n'));
    const next = this.replies.shift();
    if (next === undefined) {
      throw new Error('FakeProvider: no reply queued');
    }
    if (next instanceof Error) {
      throw next;
    }
    return { content: next, model: 'fake-model' };
  }

  async isAvailable(): Promise<boolean> {
    return this.available;
  }

  getName(): string {
    return 'fake';
  }
}

export const RENT_TEXT = 'Tenant shall pay $1000 monthly rent due on the 1st.';

export const RENT_ANALYSIS = JSON.stringify({
  summary: 'A rental agreement requiring $1000 monthly rent.',
  key_points: ['Rent is $1000 per month', 'Rent is due on the 1st'],
  risks_and_concerns: ['No grace period is mentioned'],
  recommendations: ['Ask whether a late fee applies'],
  simplified_explanation: 'You pay $1000 at the start of every month.',
});

export const RENT_ANSWER = JSON.stringify({
  answer: 'Rent is due on the 1st of each month.',
  relevant_sections: [RENT_TEXT],
  confidence_level: 'high',
});
