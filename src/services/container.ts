import path from 'path';
import { AppConfig } from '../config';
import { createQdrantClient } from '../config/qdrant';
import { createGmailAuthClient } from '../config/gmail';
import { VectorStore } from '../repositories/VectorStore';
import { InMemoryVectorStore } from '../repositories/InMemoryVectorStore';
import { QdrantVectorStore } from '../repositories/QdrantVectorStore';
import { PromptGuard } from './security/PromptGuard';
import { PIIScrubber } from './security/PIIScrubber';
import { DataEncryptor } from './security/DataEncryptor';
import { RelevanceClassifier } from './filter/RelevanceClassifier';
import { FilteringPipeline } from './filter/FilteringPipeline';
import { SpamClassifier } from './ml/SpamClassifier';
import { OpenAISpamClassifier } from './ml/OpenAISpamClassifier';
import { MailProvider, GmailProvider, DemoMailProvider } from './email';
import { EmbeddingProvider } from './embedding/EmbeddingProvider';
import { OpenAIEmbeddingProvider } from './embedding/OpenAIEmbeddingProvider';
import { HashingEmbeddingProvider } from './embedding/HashingEmbeddingProvider';
import { GenerationProvider } from './llm/GenerationProvider';
import { OpenAIGenerationProvider } from './llm/OpenAIGenerationProvider';
import { PrivacyAwareIndex } from './search/PrivacyAwareIndex';
import { AnswerPipeline } from './answer/AnswerPipeline';
import { IngestionGate } from './sync/IngestionGate';
import { SyncStatusStore } from './sync/SyncStatusStore';
import { SyncOrchestrator } from './sync/SyncOrchestrator';
import { SyncScheduler } from './sync/SyncScheduler';

export interface Services {
  provider: MailProvider;
  gate: IngestionGate;
  index: PrivacyAwareIndex;
  answers: AnswerPipeline;
  status: SyncStatusStore;
  orchestrator: SyncOrchestrator;
  scheduler: SyncScheduler | null;
}

/**
 * Optional collaborators that tests replace with in-process fakes
 */
export interface ServiceOverrides {
  provider?: MailProvider;
  vectorStore?: VectorStore;
  embedder?: EmbeddingProvider;
  generator?: GenerationProvider | null;
  spamClassifier?: SpamClassifier | null;
}

function createProvider(config: AppConfig): MailProvider {
  if (config.mail.useDemoData) {
    const mailboxPath = path.resolve(process.cwd(), config.mail.demoMailboxPath);
    console.log(`📧 Using demo mailbox at ${mailboxPath}`);
    return new DemoMailProvider(mailboxPath);
  }

  return new GmailProvider(createGmailAuthClient(config.mail.google), {
    chunkSize: config.mail.chunkSize,
    accountType: config.mail.accountType
  });
}

function createVectorStore(config: AppConfig): VectorStore {
  if (config.vectorStore.backend === 'memory') {
    return new InMemoryVectorStore();
  }
  return new QdrantVectorStore(createQdrantClient(config.vectorStore), config.vectorStore.collectionName);
}

function createEmbedder(config: AppConfig): EmbeddingProvider {
  const { embeddingProvider, openaiApiKey, embeddingModel } = config.models;

  if (embeddingProvider === 'openai') {
    if (openaiApiKey) {
      return new OpenAIEmbeddingProvider(openaiApiKey, embeddingModel);
    }
    console.warn('⚠️ [INDEX] OPENAI_API_KEY not set, falling back to feature-hashing embeddings');
  }
  return new HashingEmbeddingProvider();
}

function createGenerator(config: AppConfig): GenerationProvider | null {
  if (!config.models.openaiApiKey) {
    console.warn('⚠️ [RAG] OPENAI_API_KEY not set, answer generation disabled');
    return null;
  }
  return new OpenAIGenerationProvider(config.models.openaiApiKey, config.models.generationModel);
}

function createSpamClassifier(config: AppConfig): SpamClassifier | null {
  const { spamModelId, spamModelToken, spamModelBaseUrl } = config.models;
  if (!spamModelId || !spamModelToken) {
    return null;
  }
  return new OpenAISpamClassifier({ modelId: spamModelId, apiToken: spamModelToken, baseURL: spamModelBaseUrl });
}

/**
 * Wire every service from the validated configuration
 */
export function buildServices(config: AppConfig, overrides: ServiceOverrides = {}): Services {
  const guard = new PromptGuard();
  const scrubber = new PIIScrubber();
  const encryptor = new DataEncryptor(config.encryptionKey, config.appEnv);

  const classifier = new RelevanceClassifier({
    vipSenders: config.filter.vipSenders,
    importantKeywords: config.filter.importantKeywords,
    spamKeywords: config.filter.spamKeywords
  });
  const spamClassifier = overrides.spamClassifier !== undefined ? overrides.spamClassifier : createSpamClassifier(config);
  const pipeline = new FilteringPipeline(classifier, spamClassifier, {
    stageOrder: config.filter.stageOrder,
    debug: config.sync.debug
  });

  const provider = overrides.provider || createProvider(config);
  const index = new PrivacyAwareIndex(
    overrides.vectorStore || createVectorStore(config),
    overrides.embedder || createEmbedder(config),
    encryptor,
    guard,
    { debug: config.sync.debug }
  );
  const generator = overrides.generator !== undefined ? overrides.generator : createGenerator(config);
  const answers = new AnswerPipeline(index, generator, scrubber, guard, { searchResults: config.searchResults });

  const gate = new IngestionGate(guard, pipeline);
  const status = new SyncStatusStore();
  const orchestrator = new SyncOrchestrator(provider, gate, index, status, {
    query: config.mail.query,
    maxEmails: config.sync.maxEmails,
    pageSize: config.sync.pageSize,
    readinessDays: config.sync.readinessDays,
    debug: config.sync.debug
  });
  const scheduler = config.sync.autoSyncCron ? new SyncScheduler(orchestrator, config.sync.autoSyncCron) : null;

  return { provider, gate, index, answers, status, orchestrator, scheduler };
}
