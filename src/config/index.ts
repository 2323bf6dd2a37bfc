import Joi from 'joi';
import { AccountType } from '../types/models';
import { ConfigurationError } from '../types/errors';
import { AppEnvironment } from '../services/security/DataEncryptor';
import { StageOrder } from '../services/filter/FilteringPipeline';
import { DEFAULT_PROVIDER_QUERY } from '../services/sync/SyncOrchestrator';

export type EmbeddingBackend = 'openai' | 'hashing';
export type VectorStoreBackend = 'qdrant' | 'memory';

export interface AppConfig {
  appEnv: AppEnvironment;
  port: number;
  mail: {
    useDemoData: boolean;
    demoMailboxPath: string;
    query: string;
    chunkSize: number;
    accountType: AccountType;
    google: {
      clientId?: string;
      clientSecret?: string;
      refreshToken?: string;
    };
  };
  sync: {
    maxEmails: number;
    pageSize: number;
    readinessDays: number;
    autoSyncCron?: string;
    shutdownGraceMs: number;
    debug: boolean;
  };
  encryptionKey?: string;
  models: {
    openaiApiKey?: string;
    generationModel: string;
    embeddingProvider: EmbeddingBackend;
    embeddingModel: string;
    spamModelId?: string;
    spamModelToken?: string;
    spamModelBaseUrl?: string;
  };
  vectorStore: {
    backend: VectorStoreBackend;
    qdrantUrl: string;
    qdrantApiKey?: string;
    collectionName: string;
  };
  filter: {
    stageOrder: StageOrder;
    vipSenders: string[];
    importantKeywords?: string[];
    spamKeywords?: string[];
  };
  searchResults: number;
}

/**
 * Environment variables after Joi conversion and defaults
 */
interface EnvVars {
  APP_ENV: AppEnvironment;
  PORT: number;
  USE_DEMO_DATA: boolean;
  DEMO_MAILBOX_PATH: string;
  PROVIDER_QUERY: string;
  MAIL_ACCOUNT_TYPE: AccountType;
  SYNC_MAX_EMAILS: number;
  SYNC_PAGE_SIZE: number;
  SYNC_READINESS_DAYS: number;
  SYNC_DEBUG: boolean;
  PROVIDER_CHUNK_SIZE: number;
  ENCRYPTION_KEY?: string;
  OPENAI_API_KEY?: string;
  GENERATION_MODEL: string;
  EMBEDDING_PROVIDER?: EmbeddingBackend;
  EMBEDDING_MODEL: string;
  VECTOR_STORE: VectorStoreBackend;
  QDRANT_URL: string;
  QDRANT_API_KEY?: string;
  QDRANT_COLLECTION_NAME: string;
  SPAM_MODEL_ID?: string;
  SPAM_MODEL_TOKEN?: string;
  SPAM_MODEL_BASE_URL?: string;
  FILTER_STAGE_ORDER: StageOrder;
  VIP_SENDERS?: string;
  IMPORTANT_KEYWORDS?: string;
  SPAM_KEYWORDS?: string;
  GOOGLE_CLIENT_ID?: string;
  GOOGLE_CLIENT_SECRET?: string;
  GOOGLE_REFRESH_TOKEN?: string;
  AUTO_SYNC_CRON?: string;
  SHUTDOWN_GRACE_MS: number;
  SEARCH_RESULTS: number;
}

const optionalString = () => Joi.string().trim().empty('');

const envSchema = Joi.object<EnvVars>({
  APP_ENV: Joi.string().valid('dev', 'test', 'prod').empty('').default('dev'),
  PORT: Joi.number().integer().min(1).max(65535).empty('').default(3000),
  USE_DEMO_DATA: Joi.boolean().empty('').default(false),
  DEMO_MAILBOX_PATH: optionalString().default('data/demo_mailbox.json'),
  PROVIDER_QUERY: optionalString().default(DEFAULT_PROVIDER_QUERY),
  MAIL_ACCOUNT_TYPE: Joi.string().valid('personal', 'work', 'school').empty('').default('personal'),
  SYNC_MAX_EMAILS: Joi.number().integer().min(1).empty('').default(500),
  SYNC_PAGE_SIZE: Joi.number().integer().min(1).max(500).empty('').default(50),
  SYNC_READINESS_DAYS: Joi.number().integer().min(0).empty('').default(7),
  SYNC_DEBUG: Joi.boolean().empty('').default(false),
  PROVIDER_CHUNK_SIZE: Joi.number().integer().min(1).max(100).empty('').default(15),
  ENCRYPTION_KEY: optionalString(),
  OPENAI_API_KEY: optionalString(),
  GENERATION_MODEL: optionalString().default('gpt-4o-mini'),
  EMBEDDING_PROVIDER: Joi.string().valid('openai', 'hashing').empty(''),
  EMBEDDING_MODEL: optionalString().default('text-embedding-3-small'),
  VECTOR_STORE: Joi.string().valid('qdrant', 'memory').empty('').default('qdrant'),
  QDRANT_URL: Joi.string().uri().empty('').default('http://localhost:6333'),
  QDRANT_API_KEY: optionalString(),
  QDRANT_COLLECTION_NAME: optionalString().default('email_knowledge'),
  SPAM_MODEL_ID: optionalString(),
  SPAM_MODEL_TOKEN: optionalString(),
  SPAM_MODEL_BASE_URL: Joi.string().uri().empty(''),
  FILTER_STAGE_ORDER: Joi.string().valid('heuristics-first', 'ml-first', 'combined').empty('').default('heuristics-first'),
  VIP_SENDERS: optionalString(),
  IMPORTANT_KEYWORDS: optionalString(),
  SPAM_KEYWORDS: optionalString(),
  GOOGLE_CLIENT_ID: optionalString(),
  GOOGLE_CLIENT_SECRET: optionalString(),
  GOOGLE_REFRESH_TOKEN: optionalString(),
  AUTO_SYNC_CRON: optionalString(),
  SHUTDOWN_GRACE_MS: Joi.number().integer().min(0).empty('').default(10000),
  SEARCH_RESULTS: Joi.number().integer().min(1).max(200).empty('').default(30)
}).unknown(true);

function parseList(value: string | undefined): string[] | undefined {
  if (value === undefined) {
    return undefined;
  }
  return value.split(',').map(item => item.trim()).filter(item => item.length > 0);
}

/**
 * Validates the environment and builds the application configuration.
 * Throws ConfigurationError listing every invalid variable.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const { error, value } = envSchema.validate(env, { abortEarly: false, convert: true });

  if (error || !value) {
    const details = error ? error.details.map(detail => detail.message) : [];
    throw new ConfigurationError('Invalid environment configuration', details);
  }

  if (value.APP_ENV === 'prod' && !value.ENCRYPTION_KEY) {
    throw new ConfigurationError('ENCRYPTION_KEY is required when APP_ENV=prod', ['"ENCRYPTION_KEY" is required']);
  }

  return {
    appEnv: value.APP_ENV,
    port: value.PORT,
    mail: {
      useDemoData: value.USE_DEMO_DATA,
      demoMailboxPath: value.DEMO_MAILBOX_PATH,
      query: value.PROVIDER_QUERY,
      chunkSize: value.PROVIDER_CHUNK_SIZE,
      accountType: value.MAIL_ACCOUNT_TYPE,
      google: {
        clientId: value.GOOGLE_CLIENT_ID,
        clientSecret: value.GOOGLE_CLIENT_SECRET,
        refreshToken: value.GOOGLE_REFRESH_TOKEN
      }
    },
    sync: {
      maxEmails: value.SYNC_MAX_EMAILS,
      pageSize: value.SYNC_PAGE_SIZE,
      readinessDays: value.SYNC_READINESS_DAYS,
      autoSyncCron: value.AUTO_SYNC_CRON,
      shutdownGraceMs: value.SHUTDOWN_GRACE_MS,
      debug: value.SYNC_DEBUG
    },
    encryptionKey: value.ENCRYPTION_KEY,
    models: {
      openaiApiKey: value.OPENAI_API_KEY,
      generationModel: value.GENERATION_MODEL,
      // hashing embeddings unless an OpenAI key is present
      embeddingProvider: value.EMBEDDING_PROVIDER || (value.OPENAI_API_KEY ? 'openai' : 'hashing'),
      embeddingModel: value.EMBEDDING_MODEL,
      spamModelId: value.SPAM_MODEL_ID,
      spamModelToken: value.SPAM_MODEL_TOKEN,
      spamModelBaseUrl: value.SPAM_MODEL_BASE_URL
    },
    vectorStore: {
      backend: value.VECTOR_STORE,
      qdrantUrl: value.QDRANT_URL,
      qdrantApiKey: value.QDRANT_API_KEY,
      collectionName: value.QDRANT_COLLECTION_NAME
    },
    filter: {
      stageOrder: value.FILTER_STAGE_ORDER,
      vipSenders: parseList(value.VIP_SENDERS) || [],
      importantKeywords: parseList(value.IMPORTANT_KEYWORDS),
      spamKeywords: parseList(value.SPAM_KEYWORDS)
    },
    searchResults: value.SEARCH_RESULTS
  };
}
