/**
 * Shapes shared by the dispatcher and its callers. The completions client is
 * narrowed to the one call we make so tests can substitute an in-process fake
 * for the `openai` SDK.
 */
import type OpenAI from 'openai';

export type ChatCompletion = OpenAI.Chat.ChatCompletion;
export type ChatCompletionRequest = OpenAI.Chat.ChatCompletionCreateParamsNonStreaming;

export interface CompletionRequestOptions {
  /** Per-request timeout in ms; enforced by the SDK, not the dispatcher. */
  timeout?: number;
}

export interface ChatCompletionsClient {
  create(body: ChatCompletionRequest, options?: CompletionRequestOptions): Promise<ChatCompletion>;
}

export interface DispatchSuccess {
  readonly success: true;
  readonly response: string;
  readonly error: null;
  /** Seconds since the first attempt started. */
  readonly responseTime: number;
  readonly modelUsed: string;
  readonly tokensUsed: number | null;
}

export type DispatchFailureKind =
  | 'invalid_input'
  | 'empty_response'
  | 'authentication'
  | 'rate_limit'
  | 'api_error'
  | 'unexpected';

export interface DispatchFailure {
  readonly success: false;
  readonly kind: DispatchFailureKind;
  readonly response: null;
  readonly error: string;
  readonly responseTime: number;
}

export type DispatchResult = DispatchSuccess | DispatchFailure;

export interface RetryBackoff {
  apiErrorMs: number;
  rateLimitMs: number;
  unexpectedErrorMs: number;
}
