/**
 * LLM Client for the semantic content check
 *
 * OPTIONAL: without an API key the semantic pass falls back to local
 * heuristics. The Anthropic SDK is only loaded on first use.
 *
 * API key resolution is done by the config layer (environment variable
 * ANTHROPIC_API_KEY, then outputcheck.config.json).
 */

import type Anthropic from '@anthropic-ai/sdk';
import { isRecord } from '../utils/guards.js';
import { logger } from '../utils/logger.js';

export interface LLMClientConfig {
  anthropicApiKey?: string | undefined;
  /** Anthropic model id */
  model?: string | undefined;
  maxRetries?: number | undefined;
  /** Base delay for exponential backoff between retries */
  retryBaseDelayMs?: number | undefined;
}

export interface LLMResponse {
  content: string;
  model: string;
  usage?: {
    inputTokens: number;
    outputTokens: number;
  };
}

export interface GenerateOptions {
  maxTokens?: number | undefined;
  /** Sampling temperature (0-1) */
  temperature?: number | undefined;
  systemPrompt?: string | undefined;
  /** Aborts the request and any pending retry */
  signal?: AbortSignal | undefined;
}

export enum LLMErrorCode {
  NO_API_KEY = 'NO_API_KEY',
  API_ERROR = 'API_ERROR',
  RATE_LIMIT = 'RATE_LIMIT',
  INVALID_RESPONSE = 'INVALID_RESPONSE',
  CONFIGURATION_ERROR = 'CONFIGURATION_ERROR',
  ABORTED = 'ABORTED',
}

export class LLMError extends Error {
  constructor(
    message: string,
    public code: LLMErrorCode,
    public details?: unknown
  ) {
    super(message);
    this.name = 'LLMError';
  }
}

export const DEFAULT_MODEL = 'claude-3-5-haiku-20241022';

const DEFAULT_MAX_TOKENS = 1024;

const RETRY_CONFIG = {
  maxRetries: 2,
  baseDelayMs: 500,
  maxDelayMs: 4000,
  /** Amount of randomness added to each delay (0-1) */
  jitterFactor: 0.3,
} as const;

/**
 * Exponential backoff (baseDelay * 2^attempt), capped, with jitter
 */
export function calculateBackoffDelay(
  attempt: number,
  baseDelay: number = RETRY_CONFIG.baseDelayMs,
  maxDelay: number = RETRY_CONFIG.maxDelayMs,
  jitterFactor: number = RETRY_CONFIG.jitterFactor
): number {
  const cappedDelay = Math.min(baseDelay * Math.pow(2, attempt), maxDelay);
  const jitter = cappedDelay * jitterFactor * (Math.random() - 0.5);
  return Math.max(0, Math.round(cappedDelay + jitter));
}

/**
 * Sleep that wakes early (rejecting) when the signal aborts
 */
function sleep(ms: number, signal?: AbortSignal): Promise<void> {
  return new Promise((resolve, reject) => {
    if (signal?.aborted) {
      reject(new LLMError('Request aborted', LLMErrorCode.ABORTED));
      return;
    }
    const onAbort = (): void => {
      clearTimeout(timer);
      reject(new LLMError('Request aborted', LLMErrorCode.ABORTED));
    };
    const timer = setTimeout(() => {
      signal?.removeEventListener('abort', onAbort);
      resolve();
    }, ms);
    signal?.addEventListener('abort', onAbort, { once: true });
  });
}

function statusOf(error: unknown): number | undefined {
  if (isRecord(error) && typeof error['status'] === 'number') {
    return error['status'];
  }
  return undefined;
}

/**
 * Rate limits, timeouts and 5xx are worth retrying; anything else is not
 */
export function isRetryableStatus(status: number | undefined): boolean {
  if (status === undefined) return false;
  return status === 429 || status === 408 || (status >= 500 && status < 600);
}

export class LLMClient {
  private readonly apiKey: string | null;
  private readonly model: string;
  private readonly maxRetries: number;
  private readonly retryBaseDelayMs: number;
  private anthropicClient: Anthropic | null = null;

  constructor(config: LLMClientConfig = {}) {
    this.apiKey = config.anthropicApiKey || null;
    this.model = config.model ?? DEFAULT_MODEL;
    this.maxRetries = config.maxRetries ?? RETRY_CONFIG.maxRetries;
    this.retryBaseDelayMs = config.retryBaseDelayMs ?? RETRY_CONFIG.baseDelayMs;

    if (this.apiKey) {
      logger.debug('LLM client initialized with API key', undefined, { model: this.model });
    } else {
      logger.debug('LLM client initialized without API key');
    }
  }

  isAvailable(): boolean {
    return this.apiKey !== null;
  }

  getModel(): string {
    return this.model;
  }

  private async getAnthropicClient(): Promise<Anthropic> {
    if (!this.apiKey) {
      throw new LLMError(
        'No API key available. Set ANTHROPIC_API_KEY or anthropicApiKey in outputcheck.config.json.',
        LLMErrorCode.NO_API_KEY
      );
    }

    if (!this.anthropicClient) {
      try {
        const { default: AnthropicSDK } = await import('@anthropic-ai/sdk');
        // Retries are handled here so they can honour the caller's signal
        this.anthropicClient = new AnthropicSDK({ apiKey: this.apiKey, maxRetries: 0 });
        logger.debug('Anthropic client initialized');
      } catch (error) {
        throw new LLMError(
          'Failed to initialize Anthropic SDK. Is @anthropic-ai/sdk installed?',
          LLMErrorCode.CONFIGURATION_ERROR,
          error
        );
      }
    }

    return this.anthropicClient;
  }

  /**
   * Generate a completion, retrying transient failures with backoff.
   *
   * @throws {LLMError} If generation fails after all retries or is aborted
   */
  async generate(prompt: string, options: GenerateOptions = {}): Promise<LLMResponse> {
    const startTime = Date.now();

    for (let attempt = 0; ; attempt++) {
      try {
        return await this.attemptGeneration(prompt, options, startTime);
      } catch (error: unknown) {
        if (options.signal?.aborted) {
          throw new LLMError('Request aborted', LLMErrorCode.ABORTED, error);
        }
        if (error instanceof LLMError) {
          throw error;
        }

        const status = statusOf(error);
        if (!isRetryableStatus(status) || attempt >= this.maxRetries) {
          throw this.wrapError(error, Date.now() - startTime);
        }

        const delayMs = calculateBackoffDelay(attempt, this.retryBaseDelayMs);
        logger.warn('LLM generation failed, retrying', undefined, {
          attempt: attempt + 1,
          maxRetries: this.maxRetries,
          delayMs,
          errorStatus: status,
        });
        await sleep(delayMs, options.signal);
      }
    }
  }

  private async attemptGeneration(
    prompt: string,
    options: GenerateOptions,
    startTime: number
  ): Promise<LLMResponse> {
    const client = await this.getAnthropicClient();

    const response = await client.messages.create(
      {
        model: this.model,
        max_tokens: options.maxTokens ?? DEFAULT_MAX_TOKENS,
        temperature: options.temperature ?? 0,
        ...(options.systemPrompt !== undefined && { system: options.systemPrompt }),
        messages: [{ role: 'user', content: prompt }],
      },
      options.signal ? { signal: options.signal } : undefined
    );

    const textBlock = response.content.find((block) => block.type === 'text');
    if (!textBlock || textBlock.type !== 'text' || !textBlock.text) {
      throw new LLMError(
        'Invalid API response: no text content found',
        LLMErrorCode.INVALID_RESPONSE,
        { stopReason: response.stop_reason }
      );
    }

    const usage = {
      inputTokens: response.usage.input_tokens,
      outputTokens: response.usage.output_tokens,
    };

    logger.debug('LLM generation completed', undefined, {
      model: this.model,
      elapsedMs: Date.now() - startTime,
      ...usage,
    });

    return { content: textBlock.text, model: response.model, usage };
  }

  private wrapError(error: unknown, elapsedMs: number): LLMError {
    const status = statusOf(error);
    const message = error instanceof Error ? error.message : String(error);

    if (status === 429) {
      logger.warn('Rate limit exceeded', error, { elapsedMs });
      return new LLMError('Rate limit exceeded. Please try again later.', LLMErrorCode.RATE_LIMIT, error);
    }

    logger.warn('LLM request failed', error, { status, elapsedMs });
    return new LLMError(`API error: ${message}`, LLMErrorCode.API_ERROR, error);
  }
}

export function createClient(config?: LLMClientConfig): LLMClient {
  return new LLMClient(config);
}
