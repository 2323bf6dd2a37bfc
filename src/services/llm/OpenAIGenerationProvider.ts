import OpenAI from 'openai';
import { GenerationOptions, GenerationProvider } from './GenerationProvider';

/**
 * Generation through OpenAI chat completions
 */
export class OpenAIGenerationProvider implements GenerationProvider {
  private openai: OpenAI;
  readonly model: string;

  constructor(apiKey: string, model: string = 'gpt-4o-mini') {
    this.openai = new OpenAI({ apiKey });
    this.model = model;
  }

  async generate(prompt: string, options: GenerationOptions = {}): Promise<string> {
    const response = await this.openai.chat.completions.create({
      model: this.model,
      messages: [{ role: 'user', content: prompt }],
      temperature: options.temperature ?? 0.3,
      max_tokens: options.maxTokens ?? 1000
    });

    const content = response.choices[0]?.message?.content;
    if (!content) {
      throw new Error('Empty response from OpenAI');
    }
    return content;
  }
}
