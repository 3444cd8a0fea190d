/**
 * Semantic services
 *
 * A SemanticService grades one payload and answers with the raw JSON value
 * it received. Parsing, clamping and fallback are the SemanticValidator's
 * job, so a service only has to move bytes and surface transport failures.
 */

import {
  buildSemanticPrompt,
  extractJsonObject,
  SEMANTIC_SYSTEM_PROMPT,
  type SemanticPromptContext,
} from '../prompts/index.js';
import { ExternalServiceError } from '../utils/errors.js';
import type { LLMClient } from './llm-client.js';

export interface SemanticService {
  readonly name: string;
  isAvailable(): boolean;
  /**
   * @throws On transport failure, non-success status or abort
   */
  assess(context: SemanticPromptContext, signal: AbortSignal): Promise<unknown>;
}

/**
 * Grades content with an Anthropic model
 */
export class LLMSemanticService implements SemanticService {
  readonly name = 'anthropic';

  constructor(private readonly client: Pick<LLMClient, 'isAvailable' | 'generate'>) {}

  isAvailable(): boolean {
    return this.client.isAvailable();
  }

  async assess(context: SemanticPromptContext, signal: AbortSignal): Promise<unknown> {
    const response = await this.client.generate(buildSemanticPrompt(context), {
      systemPrompt: SEMANTIC_SYSTEM_PROMPT,
      maxTokens: 1024,
      temperature: 0,
      signal,
    });
    return extractJsonObject(response.content);
  }
}

export interface HttpSemanticServiceConfig {
  url: string;
  headers?: Record<string, string> | undefined;
  /** Injectable for tests */
  fetchImpl?: typeof fetch | undefined;
}

/**
 * Posts the assessment context to an external content-quality endpoint.
 *
 * Request body: { validation_type, validation_level, schema, data, structural_errors, prompt }
 */
export class HttpSemanticService implements SemanticService {
  readonly name = 'http';
  private readonly fetchImpl: typeof fetch;

  constructor(private readonly config: HttpSemanticServiceConfig) {
    this.fetchImpl = config.fetchImpl ?? fetch;
  }

  isAvailable(): boolean {
    return this.config.url.length > 0;
  }

  async assess(context: SemanticPromptContext, signal: AbortSignal): Promise<unknown> {
    const response = await this.fetchImpl(this.config.url, {
      method: 'POST',
      headers: { 'content-type': 'application/json', ...this.config.headers },
      body: JSON.stringify({
        validation_type: context.validationType,
        validation_level: context.validationLevel,
        schema: context.schema,
        data: context.payload,
        structural_errors: context.structuralErrors,
        prompt: buildSemanticPrompt(context),
      }),
      signal,
    });

    if (!response.ok) {
      throw new ExternalServiceError(this.name, `Semantic service responded with ${response.status}`, {
        status: response.status,
        url: this.config.url,
      });
    }

    return response.json();
  }
}

/**
 * Stands in when no service is configured
 */
export class UnavailableSemanticService implements SemanticService {
  readonly name = 'none';

  isAvailable(): boolean {
    return false;
  }

  assess(): Promise<unknown> {
    return Promise.reject(new ExternalServiceError(this.name, 'No semantic service configured'));
  }
}
