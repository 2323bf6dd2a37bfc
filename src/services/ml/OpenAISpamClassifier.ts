import OpenAI from 'openai';
import Joi from 'joi';
import { SpamClassifier, SpamLabel } from './SpamClassifier';

export interface OpenAISpamClassifierOptions {
  modelId: string;
  apiToken: string;
  baseURL?: string;
}

interface SpamResponse {
  label: SpamLabel;
  confidence?: number;
}

const spamResponseSchema = Joi.object<SpamResponse>({
  label: Joi.string().lowercase().valid('spam', 'ham').required(),
  confidence: Joi.number().min(0).max(1).optional()
}).unknown(true);

/**
 * Spam/ham classification through a chat-completions model that answers in JSON
 */
export class OpenAISpamClassifier implements SpamClassifier {
  private openai: OpenAI;
  private model: string;

  constructor(options: OpenAISpamClassifierOptions) {
    this.openai = new OpenAI({
      apiKey: options.apiToken,
      baseURL: options.baseURL
    });
    this.model = options.modelId;
  }

  async classify(text: string): Promise<SpamLabel> {
    const response = await this.openai.chat.completions.create({
      model: this.model,
      messages: [
        {
          role: 'system',
          content: 'You are a spam detector. Decide whether the email is unsolicited bulk or marketing mail ("spam") or a personal or transactional message ("ham"). Respond with JSON: {"label": "spam" | "ham", "confidence": number between 0 and 1}.'
        },
        {
          role: 'user',
          content: text
        }
      ],
      temperature: 0,
      max_tokens: 50,
      response_format: { type: 'json_object' }
    });

    return this.parseResponse(response.choices[0]?.message?.content ?? null);
  }

  private parseResponse(content: string | null): SpamLabel {
    if (!content) {
      throw new Error('Empty response from spam model');
    }

    let parsed: unknown;
    try {
      parsed = JSON.parse(content);
    } catch (error) {
      throw new Error(`Invalid JSON response from spam model: ${content.substring(0, 100)}`);
    }

    const { error, value } = spamResponseSchema.validate(parsed);
    if (error) {
      throw new Error(`Unexpected spam model response: ${error.message}`);
    }

    return value.label;
  }
}
