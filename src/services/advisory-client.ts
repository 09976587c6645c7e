//advisory service access: the capability the orchestrator depends on, and its OpenAI implementation
//the knowledge base for a jurisdiction is an OpenAI vector store searched with the file_search tool
import { Logger } from '@nestjs/common';
import OpenAI from 'openai';
import { AdvisoryServiceError, ConfigurationError } from '../models/index.js';
import type { AdvisoryQuery } from './prompt-builder.js';

export interface AdvisoryRequest {
  query: AdvisoryQuery;
  knowledgeBaseId: string;
  model: string;
  signal: AbortSignal;
}

export interface IAdvisoryClient {
  //resolves with the raw reply text; rejects with AdvisoryServiceError or ConfigurationError
  ask(request: AdvisoryRequest): Promise<string>;
}

export interface OpenAiAdvisoryClientOptions {
  apiKey: string;
  baseURL?: string;
}

//maps SDK failures onto the retry policy's terms
export function toAdvisoryError(error: unknown, knowledgeBaseId: string): Error {
  if (error instanceof AdvisoryServiceError || error instanceof ConfigurationError) return error;
  if (error instanceof OpenAI.APIUserAbortError) return new AdvisoryServiceError('Advisory call aborted', true, 1, { cause: error });
  if (error instanceof OpenAI.APIConnectionError) return new AdvisoryServiceError(`Advisory service unreachable: ${error.message}`, true, 1, { cause: error });
  if (error instanceof OpenAI.APIError) {
    const status = error.status ?? 0;
    if (status === 404) return new ConfigurationError(`Knowledge base ${knowledgeBaseId} was not found: ${error.message}`);
    const retryable = status === 408 || status === 409 || status === 429 || status >= 500;
    return new AdvisoryServiceError(`Advisory service error (${status}): ${error.message}`, retryable, 1, { cause: error });
  }
  const message = error instanceof Error ? error.message : String(error);
  return new AdvisoryServiceError(`Unexpected advisory failure: ${message}`, false, 1, { cause: error });
}

export class OpenAiAdvisoryClient implements IAdvisoryClient {
  private readonly logger = new Logger(OpenAiAdvisoryClient.name);
  private readonly client: OpenAI;

  constructor(options: OpenAiAdvisoryClientOptions) {
    //retries and timeouts belong to the orchestrator's policy
    this.client = new OpenAI({ apiKey: options.apiKey, baseURL: options.baseURL, maxRetries: 0 });
  }

  async ask({ query, knowledgeBaseId, model, signal }: AdvisoryRequest): Promise<string> {
    try {
      const response = await this.client.responses.create(
        {
          model,
          input: query.prompt,
          tools: [{ type: 'file_search', vector_store_ids: [knowledgeBaseId] }],
          temperature: 0,
        },
        { signal },
      );
      const text = response.output_text;
      if (!text) throw new AdvisoryServiceError('Advisory service returned an empty reply', true);
      return text;
    } catch (error) {
      const mapped = toAdvisoryError(error, knowledgeBaseId);
      this.logger.warn(`Advisory call for line ${query.lineItemId} failed: ${mapped.message}`);
      throw mapped;
    }
  }
}
