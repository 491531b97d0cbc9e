// src/services/pipeline-deps.ts: process-wide collaborators, built once at startup and shared read-only
import type { AppConfig } from '@/config/app.config';
import type { OrchestratorDeps } from '@/services/orchestrator';
import { OllamaLlmClient, OpenAILlmClient, type LlmClient } from '@/services/llm-client';
import type { Embedder } from '@/services/providers/retrieval-vector-utils';
import type { RelevanceScorer, VectorIndex } from '@/services/providers/retrieval-types';
import { OpenAIEmbedder } from '@/services/providers/embeddings/openai-embedder';
import { SimpleEmbedder } from '@/services/providers/embeddings/simple-embedder';
import { QdrantVectorIndex } from '@/services/providers/vector-index/qdrant-index';
import { InMemoryVectorIndex } from '@/services/providers/vector-index/in-memory-index';
import { CrossEncoderScorer } from '@/services/providers/relevance/cross-encoder-scorer';
import { LlmRelevanceScorer } from '@/services/providers/relevance/llm-scorer';
import { HybridRetriever } from '@/services/retrieval/hybrid-retriever';
import { Reranker } from '@/services/rerank';
import { ActionClassifier } from '@/services/action-classifier';
import { CollaboratorError } from '@/utils/errors';
import { logger } from '@/services/logger';

let cachedDeps: Readonly<OrchestratorDeps> | null = null;
let pendingInit: Promise<Readonly<OrchestratorDeps>> | null = null;

function requireOpenAiKey(config: AppConfig, collaborator: 'llm' | 'embedder'): string {
  const key = config.llm.openAiApiKey;
  if (!key) {
    throw new CollaboratorError(collaborator, 'Missing OPENAI_API_KEY. Set it in .env or the environment.');
  }
  return key;
}

export function createLlmClient(config: AppConfig): LlmClient {
  if (config.llm.provider === 'ollama') {
    return new OllamaLlmClient({
      baseUrl: config.llm.ollamaUrl,
      model: config.llm.ollamaModel,
      timeoutMs: config.llm.timeoutMs,
    });
  }
  return new OpenAILlmClient({
    apiKey: requireOpenAiKey(config, 'llm'),
    model: config.llm.openAiModel,
    timeoutMs: config.llm.timeoutMs,
  });
}

export function createEmbedder(config: AppConfig): Embedder {
  if (config.embedder.kind === 'simple') {
    return new SimpleEmbedder(config.embedder.simpleDim);
  }
  return new OpenAIEmbedder({
    apiKey: requireOpenAiKey(config, 'embedder'),
    model: config.embedder.openAiModel,
    timeoutMs: config.llm.timeoutMs,
  });
}

export async function createVectorIndex(config: AppConfig, embedder: Embedder): Promise<VectorIndex> {
  const vi = config.vectorIndex;
  if (vi.kind === 'memory') {
    return InMemoryVectorIndex.fromFile(vi.knowledgeBasePath, embedder);
  }
  if (!vi.qdrantUrl) {
    throw new CollaboratorError('vector_index', 'QDRANT_URL is not set');
  }
  return new QdrantVectorIndex(embedder, {
    url: vi.qdrantUrl,
    apiKey: vi.qdrantApiKey,
    collection: vi.collection,
    denseVector: vi.denseVector,
    sparseVector: vi.sparseVector,
    timeoutMs: vi.timeoutMs,
  });
}

export function createRelevanceScorer(config: AppConfig, llm: LlmClient): RelevanceScorer {
  if (config.reranker.kind === 'llm') {
    return new LlmRelevanceScorer(llm);
  }
  return new CrossEncoderScorer({ url: config.reranker.url, timeoutMs: config.llm.timeoutMs });
}

async function buildDeps(config: AppConfig): Promise<Readonly<OrchestratorDeps>> {
  const startedAt = Date.now();
  const llm = createLlmClient(config);
  const embedder = createEmbedder(config);
  const [index, actionClassifier] = await Promise.all([
    createVectorIndex(config, embedder),
    ActionClassifier.create(embedder),
  ]);

  const deps: OrchestratorDeps = {
    llm,
    retriever: new HybridRetriever(index),
    reranker: new Reranker(createRelevanceScorer(config, llm)),
    actionClassifier,
    settings: Object.freeze({
      initialK: config.retrieval.initialK,
      rerankTopK: config.retrieval.rerankTopK,
      finalK: config.retrieval.finalK,
      actionThreshold: config.actionThreshold,
    }),
  };

  logger.info('pipeline:ready', {
    llm: config.llm.provider,
    embedder: config.embedder.kind,
    vectorIndex: config.vectorIndex.kind,
    reranker: config.reranker.kind,
    durationMs: Date.now() - startedAt,
  });
  return Object.freeze(deps);
}

/** Build the shared collaborators once; concurrent callers share the same initialisation. */
export async function initPipelineDeps(config: AppConfig): Promise<Readonly<OrchestratorDeps>> {
  if (cachedDeps) return cachedDeps;
  if (!pendingInit) {
    pendingInit = buildDeps(config);
  }
  try {
    cachedDeps = await pendingInit;
    return cachedDeps;
  } finally {
    pendingInit = null;
  }
}

export async function shutdownPipelineDeps(): Promise<void> {
  if (pendingInit) {
    await pendingInit.catch((err: unknown) => {
      logger.warn('pipeline:init_failed_during_shutdown', {
        err: err instanceof Error ? err.message : String(err),
      });
    });
  }
  if (cachedDeps) {
    cachedDeps = null;
    logger.info('pipeline:released');
  }
}
