import OpenAI from 'openai';
import { setTimeout as delay } from 'timers/promises';
import { ConfigurationError, type AiConfig } from '../config';
import { logger as defaultLogger, type Logger } from '../config/logger';
import { charLength } from '../utils/text';
import type {
  ChatCompletionsClient,
  DispatchFailure,
  DispatchFailureKind,
  DispatchResult,
  DispatchSuccess,
  RetryBackoff,
} from '../ai/llm/types';

const MAX_COMPLETION_TOKENS = 1000;
const CONNECTION_TEST_MESSAGE = 'Hello! This is a connection test.';

export const DEFAULT_BACKOFF: Readonly<RetryBackoff> = Object.freeze({
  apiErrorMs: 1000,
  rateLimitMs: 2000,
  unexpectedErrorMs: 1000,
});

export const EMPTY_MESSAGE_ERROR = 'Empty message provided';
export const EMPTY_RESPONSE_ERROR = 'Empty response from API';
export const INVALID_API_KEY_ERROR = 'Invalid API key. Please check your configuration.';
export const RATE_LIMIT_ERROR = 'Rate limit exceeded. Please try again later.';

export interface MessageDispatcherDeps {
  /** Defaults to `chat.completions` of an `openai` client bound to the configured key. */
  client?: ChatCompletionsClient;
  sleep?: (ms: number) => Promise<void>;
  backoff?: Partial<RetryBackoff>;
  /** Monotonic clock in ms. */
  now?: () => number;
  logger?: Logger;
}

function failure(kind: DispatchFailureKind, error: string, responseTime: number): DispatchFailure {
  const result: DispatchFailure = { success: false, kind, response: null, error, responseTime };
  return Object.freeze(result);
}

function success(response: string, responseTime: number, modelUsed: string, tokensUsed: number | null): DispatchSuccess {
  const result: DispatchSuccess = { success: true, response, error: null, responseTime, modelUsed, tokensUsed };
  return Object.freeze(result);
}

function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

function assertConfig(config: AiConfig): void {
  if (!config.openaiApiKey?.trim()) {
    throw new ConfigurationError('Missing required configuration: OPENAI_API_KEY', ['OPENAI_API_KEY']);
  }
  const limits: Array<[key: string, value: number, integer: boolean]> = [
    ['MAX_MESSAGE_LENGTH', config.maxMessageLength, true],
    ['MAX_RETRIES', config.maxRetries, true],
    ['API_TIMEOUT', config.apiTimeoutSeconds, false],
  ];
  for (const [key, value, integer] of limits) {
    if (!Number.isFinite(value) || value <= 0 || (integer && !Number.isInteger(value))) {
      throw new ConfigurationError(
        `Invalid configuration: ${key} must be a positive ${integer ? 'integer' : 'number'}, got ${value}`
      );
    }
  }
}

/**
 * Sends a single user message to the chat completions endpoint, retrying
 * transient failures, and reports the outcome as a DispatchResult.
 * Failures never throw; only construction does.
 */
export class MessageDispatcher {
  private readonly client: ChatCompletionsClient;
  private readonly sleep: (ms: number) => Promise<void>;
  private readonly backoff: RetryBackoff;
  private readonly now: () => number;
  private readonly logger: Logger;

  constructor(
    private readonly config: AiConfig,
    deps: MessageDispatcherDeps = {}
  ) {
    assertConfig(config);
    this.client =
      deps.client ??
      new OpenAI({
        apiKey: config.openaiApiKey,
        // Retries are ours; the SDK would otherwise retry 429/5xx on its own.
        maxRetries: 0,
      }).chat.completions;
    this.sleep = deps.sleep ?? ((ms) => delay(ms));
    this.backoff = { ...DEFAULT_BACKOFF, ...deps.backoff };
    this.now = deps.now ?? (() => performance.now());
    this.logger = deps.logger ?? defaultLogger;
  }

  async dispatch(message: string, model: string = this.config.defaultModel): Promise<DispatchResult> {
    if (!message || !message.trim()) {
      return failure('invalid_input', EMPTY_MESSAGE_ERROR, 0);
    }
    if (charLength(message) > this.config.maxMessageLength) {
      return failure('invalid_input', `Message too long. Maximum ${this.config.maxMessageLength} characters allowed.`, 0);
    }

    const startedAt = this.now();
    const elapsed = () => Math.max(0, (this.now() - startedAt) / 1000);
    const { maxRetries } = this.config;

    for (let attempt = 0; attempt < maxRetries; attempt++) {
      const isLastAttempt = attempt === maxRetries - 1;
      try {
        const completion = await this.client.create(
          {
            model,
            messages: [{ role: 'user', content: message }],
            max_tokens: MAX_COMPLETION_TOKENS,
          },
          { timeout: this.config.apiTimeoutSeconds * 1000 }
        );

        const content = completion.choices[0]?.message?.content;
        if (!content) {
          return failure('empty_response', EMPTY_RESPONSE_ERROR, elapsed());
        }
        return success(content, elapsed(), model, completion.usage?.total_tokens ?? null);
      } catch (error) {
        // Subclasses first: both extend OpenAI.APIError.
        if (error instanceof OpenAI.AuthenticationError) {
          return failure('authentication', INVALID_API_KEY_ERROR, elapsed());
        }

        let waitMs: number;
        if (error instanceof OpenAI.RateLimitError) {
          this.logger.error(`Rate limit exceeded (attempt ${attempt + 1}): ${error.message}`, { model });
          if (isLastAttempt) {
            return failure('rate_limit', RATE_LIMIT_ERROR, elapsed());
          }
          waitMs = this.backoff.rateLimitMs;
        } else if (error instanceof OpenAI.APIError) {
          this.logger.error(`OpenAI API error (attempt ${attempt + 1}): ${error.message}`, {
            model,
            status: error.status,
          });
          if (isLastAttempt) {
            return failure('api_error', `API Error: ${error.message}`, elapsed());
          }
          waitMs = this.backoff.apiErrorMs;
        } else {
          this.logger.error(`Unexpected error (attempt ${attempt + 1}): ${errorMessage(error)}`, { model });
          if (isLastAttempt) {
            return failure('unexpected', `Unexpected error: ${errorMessage(error)}`, elapsed());
          }
          waitMs = this.backoff.unexpectedErrorMs;
        }
        await this.sleep(waitMs);
      }
    }

    // maxRetries is validated as a positive integer, so the loop always returns.
    return failure('unexpected', `Unexpected error: no attempts made (maxRetries=${maxRetries})`, elapsed());
  }

  testConnection(): Promise<DispatchResult> {
    return this.dispatch(CONNECTION_TEST_MESSAGE);
  }
}
