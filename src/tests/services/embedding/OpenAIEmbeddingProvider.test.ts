import { OpenAIEmbeddingProvider } from '../../../services/embedding/OpenAIEmbeddingProvider';

const mockEmbeddings = {
  create: jest.fn()
};

jest.mock('openai', () => ({
  OpenAI: jest.fn().mockImplementation(() => ({
    embeddings: mockEmbeddings
  }))
}));

describe('OpenAIEmbeddingProvider', () => {
  beforeEach(() => {
    jest.clearAllMocks();
    jest.spyOn(console, 'error').mockImplementation(() => undefined);
  });

  afterEach(() => {
    jest.restoreAllMocks();
  });

  it('should report dimensions for known models', () => {
    expect(new OpenAIEmbeddingProvider('test-api-key').dimensions).toBe(1536);
    expect(new OpenAIEmbeddingProvider('test-api-key', 'text-embedding-3-large').dimensions).toBe(3072);
  });

  it('should embed texts in batches and keep input order', async () => {
    const provider = new OpenAIEmbeddingProvider('test-api-key', 'text-embedding-3-small', 2);
    mockEmbeddings.create
      .mockResolvedValueOnce({ data: [{ index: 1, embedding: [0, 1] }, { index: 0, embedding: [1, 0] }] })
      .mockResolvedValueOnce({ data: [{ index: 0, embedding: [0.5, 0.5] }] });

    const embeddings = await provider.embed(['a', 'b', 'c']);

    expect(embeddings).toEqual([[1, 0], [0, 1], [0.5, 0.5]]);
    expect(mockEmbeddings.create).toHaveBeenNthCalledWith(1, {
      model: 'text-embedding-3-small',
      input: ['a', 'b'],
      encoding_format: 'float'
    });
  });

  it('should truncate long inputs', async () => {
    const provider = new OpenAIEmbeddingProvider('test-api-key');
    mockEmbeddings.create.mockResolvedValue({ data: [{ index: 0, embedding: [1] }] });

    await provider.embed(['x'.repeat(9000)]);

    expect(mockEmbeddings.create.mock.calls[0][0].input[0]).toHaveLength(8000);
  });

  it('should fail when the API returns the wrong number of embeddings', async () => {
    const provider = new OpenAIEmbeddingProvider('test-api-key');
    mockEmbeddings.create.mockResolvedValue({ data: [] });

    await expect(provider.embed(['a'])).rejects.toThrow('Expected 1 embeddings from OpenAI, received 0');
  });
});
