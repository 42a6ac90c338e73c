import { ChatOpenAI } from '@langchain/openai';
import { StringOutputParser } from '@langchain/core/output_parsers';
import { HumanMessage, SystemMessage } from '@langchain/core/messages';
import type { GenerationBackend, GenerationRequest } from './generationClient.js';
import type { GenerationConfig } from '../config/index.js';

/** OpenAI chat models through LangChain; retries are left to GenerationClient. */
export class OpenAIGenerationBackend implements GenerationBackend {
  readonly name: string;

  constructor(private readonly config: Pick<GenerationConfig, 'apiKey' | 'model' | 'baseUrl'> & { apiKey: string }) {
    this.name = `openai:${config.model}`;
  }

  async generate(request: GenerationRequest, signal: AbortSignal): Promise<string> {
    const llm = new ChatOpenAI({
      model: this.config.model,
      temperature: request.temperature,
      apiKey: this.config.apiKey,
      maxRetries: 0,
      ...(this.config.baseUrl ? { configuration: { baseURL: this.config.baseUrl } } : {}),
    });
    const chain = llm.pipe(new StringOutputParser());
    return chain.invoke([new SystemMessage(request.system), new HumanMessage(request.user)], { signal });
  }
}
