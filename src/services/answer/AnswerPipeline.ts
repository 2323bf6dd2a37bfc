/**
 * AnswerPipeline answers questions over the indexed mailbox. Prompts are
 * scrubbed of PII before they leave the process and restored afterwards.
 */

import { AnswerResult, SearchResult } from '../../types/models';
import { PrivacyAwareIndex } from '../search/PrivacyAwareIndex';
import { GenerationProvider } from '../llm/GenerationProvider';
import { PIIScrubber } from '../security/PIIScrubber';
import { PromptGuard } from '../security/PromptGuard';

export const REFUSAL_MESSAGE = 'I cannot answer this question as it triggered a security alert (Prompt Injection detected).';
export const NO_RESULTS_MESSAGE = "I couldn't find any relevant emails to answer your question.";
export const ANSWER_FAILED_MESSAGE = "I'm having trouble processing your question right now.";
export const SUMMARY_FAILED_MESSAGE = "I'm having trouble generating a summary right now.";

export interface AnswerPipelineOptions {
  searchResults?: number;
  summaryResults?: number;
  temperature?: number;
  now?: () => Date;
}

export class AnswerPipeline {
  private readonly searchResults: number;
  private readonly summaryResults: number;
  private readonly temperature: number;
  private readonly now: () => Date;

  constructor(
    private readonly index: PrivacyAwareIndex,
    private readonly generator: GenerationProvider | null,
    private readonly scrubber: PIIScrubber,
    private readonly guard: PromptGuard,
    options: AnswerPipelineOptions = {}
  ) {
    this.searchResults = options.searchResults || 30;
    this.summaryResults = options.summaryResults || 10;
    this.temperature = options.temperature ?? 0.3;
    this.now = options.now || (() => new Date());
  }

  get isGenerationEnabled(): boolean {
    return this.generator !== null;
  }

  /**
   * Answers a question from retrieved emails plus optional external context
   * (calendar entries, system notes). Never throws.
   */
  async answer(question: string, context: string = ''): Promise<AnswerResult> {
    if (!this.guard.validate(question)) {
      console.warn('🛡️ [SECURITY] Refused question due to potential prompt injection');
      return { answer: REFUSAL_MESSAGE, sources: [] };
    }

    const results = await this.retrieve(question, this.searchResults);
    console.log(`🔍 [RAG] Retrieved ${results.length} context documents`);

    if (results.length === 0 && !context.trim()) {
      return { answer: NO_RESULTS_MESSAGE, sources: [] };
    }

    if (!this.generator) {
      console.warn('⚠️ [RAG] Generation provider not configured');
      return { answer: ANSWER_FAILED_MESSAGE, sources: [] };
    }

    try {
      const prompt = this.buildAnswerPrompt(question, context, results);
      const answer = await this.generateScrubbed(this.generator, prompt);

      return {
        answer,
        sources: results.map(result => ({
          sender: result.sender,
          subject: result.subject,
          date: result.date,
          distance: result.distance
        }))
      };
    } catch (error) {
      console.error('❌ Failed to generate answer:', error);
      return { answer: ANSWER_FAILED_MESSAGE, sources: [] };
    }
  }

  /**
   * Summarizes the key points of emails received in the last `days` days
   */
  async summarize(days: number = 7): Promise<string> {
    const cutoff = this.now().getTime() - days * 24 * 60 * 60 * 1000;
    const results = (await this.retrieve(`emails from the last ${days} days`, this.summaryResults))
      .filter(result => {
        const time = Date.parse(result.date);
        return !isNaN(time) && time >= cutoff;
      });

    if (results.length === 0) {
      return `No relevant emails found in the last ${days} days.`;
    }

    if (!this.generator) {
      console.warn('⚠️ [RAG] Generation provider not configured');
      return SUMMARY_FAILED_MESSAGE;
    }

    const emails = results.map(result => `From: ${result.sender} | ${result.subject}`).join('\n\n');
    const prompt = `Summarize the key points from these emails from the last ${days} days. Focus on action items and important information.

Emails:
${emails}`;

    try {
      return await this.generateScrubbed(this.generator, prompt);
    } catch (error) {
      console.error('❌ Failed to generate summary:', error);
      return SUMMARY_FAILED_MESSAGE;
    }
  }

  private async retrieve(query: string, k: number): Promise<SearchResult[]> {
    try {
      return await this.index.search(query, k);
    } catch (error) {
      console.error('❌ [RAG] Retrieval failed, continuing without email context:', error);
      return [];
    }
  }

  private async generateScrubbed(generator: GenerationProvider, prompt: string): Promise<string> {
    const { text, mapping } = this.scrubber.scrub(prompt);
    const response = await generator.generate(text, { temperature: this.temperature });
    return this.scrubber.restore(response, mapping);
  }

  private buildAnswerPrompt(question: string, context: string, results: SearchResult[]): string {
    const emailContext = results.length > 0
      ? results
          .map(result => `Email from ${result.sender} on ${result.date}:\nSubject: ${result.subject}\nContent: ${result.document}`)
          .join('\n\n')
      : 'No relevant emails found.';

    return `You are a helpful personal email assistant.
Your goal is to help the user manage their day by synthesizing information from their emails and calendar.

Guidelines:
1. Be conversational, warm and professional.
2. Answer strictly based on the provided context. If the information is missing, politely say so.
3. When asked about lists, aggregate the information rather than just listing emails.
4. If you are summarizing many items, mention that this is based on the most relevant emails found.

Additional Context (Calendar/System):
<calendar_context>
${context}
</calendar_context>

Email Context:
<email_context>
${emailContext}
</email_context>

Question: ${question}`;
  }
}
