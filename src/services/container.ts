import type { Embeddings } from '@langchain/core/embeddings';
import { assertGenerationReady, type AppConfig } from '../config/index.js';
import { AnalysisPipeline } from '../analysis/pipeline.js';
import { ReflectionEngine } from '../analysis/reflection.js';
import { GenerationClient, type GenerationBackend } from '../llm/generationClient.js';
import { OpenAIGenerationBackend } from '../llm/openaiBackend.js';
import { openArchive } from '../rag/store.js';
import { AnalysisService } from './analysisService.js';

export interface Services {
  config: AppConfig;
  client: GenerationClient;
  service: AnalysisService;
  close(): void;
}

export interface ServiceOverrides {
  backend?: GenerationBackend;
  embeddings?: Embeddings;
}

/**
 * Build the object graph once per process. Without an injected backend the
 * OpenAI key is checked here, before any stage can run.
 */
export function buildServices(config: AppConfig, overrides: ServiceOverrides = {}): Services {
  let backend = overrides.backend;
  if (!backend) {
    assertGenerationReady(config);
    backend = new OpenAIGenerationBackend(config.generation);
  }
  const client = new GenerationClient(backend, config.generation);
  const archive = openArchive(config, overrides.embeddings);
  const service = new AnalysisService(
    new AnalysisPipeline(client),
    new ReflectionEngine(client, config.reflection),
    archive.store,
  );
  return { config, client, service, close: archive.close };
}
