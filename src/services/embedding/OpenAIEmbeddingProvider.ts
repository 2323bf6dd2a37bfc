import { OpenAI } from 'openai';
import { EmbeddingProvider } from './EmbeddingProvider';

const MODEL_DIMENSIONS: Record<string, number> = {
  'text-embedding-3-small': 1536,
  'text-embedding-3-large': 3072,
  'text-embedding-ada-002': 1536
};

const MAX_INPUT_CHARS = 8000;

/**
 * Embeddings through the OpenAI embeddings endpoint
 */
export class OpenAIEmbeddingProvider implements EmbeddingProvider {
  private openai: OpenAI;
  readonly model: string;
  readonly dimensions: number;

  constructor(apiKey: string, model: string = 'text-embedding-3-small', private readonly batchSize: number = 100) {
    this.openai = new OpenAI({ apiKey });
    this.model = model;
    this.dimensions = MODEL_DIMENSIONS[model] || 1536;
  }

  async embed(texts: string[]): Promise<number[][]> {
    const embeddings: number[][] = [];

    try {
      for (let i = 0; i < texts.length; i += this.batchSize) {
        const batch = texts.slice(i, i + this.batchSize).map(text => this.truncateContent(text));

        const response = await this.openai.embeddings.create({
          model: this.model,
          input: batch,
          encoding_format: 'float'
        });

        if (!response.data || response.data.length !== batch.length) {
          throw new Error(`Expected ${batch.length} embeddings from OpenAI, received ${response.data?.length ?? 0}`);
        }

        // The API may return items out of order; index is authoritative
        const ordered = [...response.data].sort((a, b) => a.index - b.index);
        embeddings.push(...ordered.map(item => item.embedding));
      }

      return embeddings;
    } catch (error) {
      console.error('❌ Failed to generate embeddings:', error);
      throw error;
    }
  }

  private truncateContent(content: string): string {
    return content.length > MAX_INPUT_CHARS ? content.substring(0, MAX_INPUT_CHARS) : content;
  }
}
