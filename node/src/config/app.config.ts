/** App configuration, parsed once from the environment. */
import { z } from 'zod';

const LOG_LEVELS = ['silly', 'trace', 'debug', 'info', 'warn', 'error', 'fatal'] as const;
export type LogLevelName = (typeof LOG_LEVELS)[number];

const optionalString = z
  .string()
  .trim()
  .optional()
  .transform((v) => (v ? v : undefined));

const envSchema = z
  .object({
    PORT: z.coerce.number().int().positive().default(4000),
    NODE_ENV: z.string().default('development'),
    LOG_LEVEL: z.enum(LOG_LEVELS).default('info'),
    CORS_ORIGIN: z.string().default('http://localhost:3000'),

    LLM_PROVIDER: z.enum(['openai', 'ollama']).default('openai'),
    OPENAI_API_KEY: optionalString,
    OPENAI_MODEL: z.string().default('gpt-4o-mini'),
    OPENAI_EMBEDDING_MODEL: z.string().default('text-embedding-3-small'),
    OLLAMA_URL: z.string().url().default('http://localhost:11434'),
    OLLAMA_MODEL: z.string().default('mistral'),
    LLM_TIMEOUT_MS: z.coerce.number().int().positive().default(60_000),

    EMBEDDER: z.enum(['openai', 'simple']).default('openai'),
    SIMPLE_EMBEDDER_DIM: z.coerce.number().int().positive().default(256),

    VECTOR_INDEX: z.enum(['qdrant', 'memory']).default('qdrant'),
    QDRANT_URL: optionalString,
    QDRANT_API_KEY: optionalString,
    QDRANT_COLLECTION: z.string().default('support_docs_hybrid'),
    QDRANT_DENSE_VECTOR: optionalString,
    QDRANT_SPARSE_VECTOR: z.string().default('bm25'),
    QDRANT_TIMEOUT_MS: z.coerce.number().int().positive().default(30_000),
    KNOWLEDGE_BASE_PATH: z.string().default('data/knowledge-base.json'),

    RERANKER: z.enum(['cross-encoder', 'llm']).default('cross-encoder'),
    RERANKER_URL: z.string().url().default('http://localhost:8080'),

    RETRIEVAL_INITIAL_K: z.coerce.number().int().positive().default(6),
    RERANK_TOP_K: z.coerce.number().int().positive().default(4),
    FINAL_DOCS_K: z.coerce.number().int().positive().default(4),
    ACTION_THRESHOLD: z.coerce.number().min(0).max(1).default(0.5),
  })
  .superRefine((env, ctx) => {
    if (env.VECTOR_INDEX === 'qdrant' && !env.QDRANT_URL) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['QDRANT_URL'],
        message: 'QDRANT_URL is required when VECTOR_INDEX=qdrant',
      });
    }
    if ((env.LLM_PROVIDER === 'openai' || env.EMBEDDER === 'openai') && !env.OPENAI_API_KEY) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['OPENAI_API_KEY'],
        message: 'OPENAI_API_KEY is required when LLM_PROVIDER=openai or EMBEDDER=openai',
      });
    }
  });

export interface AppConfig {
  port: number;
  nodeEnv: string;
  logLevel: LogLevelName;
  corsOrigins: string[];
  llm: {
    provider: 'openai' | 'ollama';
    openAiApiKey?: string;
    openAiModel: string;
    ollamaUrl: string;
    ollamaModel: string;
    timeoutMs: number;
  };
  embedder: {
    kind: 'openai' | 'simple';
    openAiModel: string;
    simpleDim: number;
  };
  vectorIndex: {
    kind: 'qdrant' | 'memory';
    qdrantUrl?: string;
    qdrantApiKey?: string;
    collection: string;
    denseVector?: string;
    sparseVector: string;
    timeoutMs: number;
    knowledgeBasePath: string;
  };
  reranker: {
    kind: 'cross-encoder' | 'llm';
    url: string;
  };
  retrieval: {
    initialK: number;
    rerankTopK: number;
    finalK: number;
  };
  actionThreshold: number;
}

export class ConfigError extends Error {
  constructor(readonly issues: Array<{ path: string; message: string }>) {
    super(`Invalid configuration: ${issues.map((i) => `${i.path}: ${i.message}`).join('; ')}`);
    this.name = 'ConfigError';
  }
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const result = envSchema.safeParse(env);
  if (!result.success) {
    throw new ConfigError(
      result.error.errors.map((e) => ({
        path: e.path.join('.') || 'root',
        message: e.message,
      })),
    );
  }
  const e = result.data;
  return Object.freeze({
    port: e.PORT,
    nodeEnv: e.NODE_ENV,
    logLevel: e.LOG_LEVEL,
    corsOrigins: e.CORS_ORIGIN.split(',').map((o) => o.trim()).filter(Boolean),
    llm: {
      provider: e.LLM_PROVIDER,
      openAiApiKey: e.OPENAI_API_KEY,
      openAiModel: e.OPENAI_MODEL,
      ollamaUrl: e.OLLAMA_URL,
      ollamaModel: e.OLLAMA_MODEL,
      timeoutMs: e.LLM_TIMEOUT_MS,
    },
    embedder: {
      kind: e.EMBEDDER,
      openAiModel: e.OPENAI_EMBEDDING_MODEL,
      simpleDim: e.SIMPLE_EMBEDDER_DIM,
    },
    vectorIndex: {
      kind: e.VECTOR_INDEX,
      qdrantUrl: e.QDRANT_URL,
      qdrantApiKey: e.QDRANT_API_KEY,
      collection: e.QDRANT_COLLECTION,
      denseVector: e.QDRANT_DENSE_VECTOR,
      sparseVector: e.QDRANT_SPARSE_VECTOR,
      timeoutMs: e.QDRANT_TIMEOUT_MS,
      knowledgeBasePath: e.KNOWLEDGE_BASE_PATH,
    },
    reranker: {
      kind: e.RERANKER,
      url: e.RERANKER_URL,
    },
    retrieval: {
      initialK: e.RETRIEVAL_INITIAL_K,
      rerankTopK: e.RERANK_TOP_K,
      finalK: e.FINAL_DOCS_K,
    },
    actionThreshold: e.ACTION_THRESHOLD,
  });
}
