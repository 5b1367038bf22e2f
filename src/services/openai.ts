import { Logger, OpenAIConfig } from '../types/index';
import { chatCompletionResponseSchema } from '../types/schemas';
import { OpenAIRequestError, errorMessage } from '../utils/errors';
import { RetryOptions, withRetry } from '../utils/retry';

export type HttpResponse = Pick<Response, 'ok' | 'status' | 'statusText' | 'text' | 'json'>;
export type FetchLike = (input: string, init: RequestInit) => Promise<HttpResponse>;

export interface CompletionOptions {
  forceJson?: boolean;
  temperature?: number;
  maxTokens?: number;
}

export interface ChatCompletionClient {
  readonly model: string;
  complete(prompt: string, options?: CompletionOptions): Promise<string>;
}

export interface OpenAIServiceOptions {
  fetchImpl?: FetchLike;
  retry?: Omit<RetryOptions, 'shouldRetry' | 'onRetry'>;
  timeoutMs?: number;
  verbose?: boolean;
  logger?: Logger;
}

const RETRIABLE_STATUSES = new Set([408, 409, 429]);

export const SYSTEM_PROMPT =
  'You are a synthetic data generator for chart understanding datasets. ' +
  'You MUST return only valid JSON. Do not include any markdown formatting, code blocks, or explanations. ' +
  'The response must be parseable JSON.';

export class OpenAIService implements ChatCompletionClient {
  private readonly config: OpenAIConfig;
  private readonly fetchImpl: FetchLike;
  private readonly retry: Omit<RetryOptions, 'shouldRetry' | 'onRetry'>;
  private readonly timeoutMs: number;
  private readonly verbose: boolean;
  private readonly logger: Logger;

  constructor(config: OpenAIConfig, options: OpenAIServiceOptions = {}) {
    if (!config.apiKey) {
      throw new OpenAIRequestError('OpenAI API key is missing (set OPENAI_API_KEY)', undefined, false);
    }
    this.config = config;
    this.fetchImpl = options.fetchImpl ?? ((input, init) => fetch(input, init));
    this.retry = options.retry ?? {};
    this.timeoutMs = options.timeoutMs ?? 120_000;
    this.verbose = options.verbose ?? false;
    this.logger = options.logger ?? console;
  }

  get model(): string {
    return this.config.model;
  }

  async complete(prompt: string, options: CompletionOptions = {}): Promise<string> {
    return withRetry(() => this.requestCompletion(prompt, options), {
      ...this.retry,
      shouldRetry: error => error instanceof OpenAIRequestError && error.retriable,
      onRetry: (error, attempt, delayMs) => {
        this.logger.warn(`⚠️  OpenAI request failed (attempt ${attempt}): ${error.message}. Retrying in ${delayMs}ms`);
      }
    });
  }

  private async requestCompletion(prompt: string, options: CompletionOptions): Promise<string> {
    const requestBody: Record<string, unknown> = {
      model: this.config.model,
      messages: [
        { role: 'system', content: SYSTEM_PROMPT },
        { role: 'user', content: prompt }
      ],
      temperature: options.temperature ?? 0.7,
      max_tokens: options.maxTokens ?? this.getMaxTokens()
    };

    if (options.forceJson) {
      requestBody.response_format = { type: 'json_object' };
    }

    if (this.verbose) {
      this.logger.log(`🤖 Requesting completion from ${this.config.model}`);
    }

    let response: HttpResponse;
    try {
      response = await this.fetchImpl(`${this.config.baseURL}/chat/completions`, {
        method: 'POST',
        headers: {
          'Authorization': `Bearer ${this.config.apiKey}`,
          'Content-Type': 'application/json'
        },
        body: JSON.stringify(requestBody),
        signal: AbortSignal.timeout(this.timeoutMs)
      });
    } catch (error) {
      throw new OpenAIRequestError(`OpenAI request failed: ${errorMessage(error)}`, undefined, true);
    }

    if (!response.ok) {
      const errorText = await response.text().catch(() => '');
      throw new OpenAIRequestError(
        `OpenAI API error: ${response.status} ${response.statusText} - ${errorText}`,
        response.status,
        RETRIABLE_STATUSES.has(response.status) || response.status >= 500
      );
    }

    let body: unknown;
    try {
      body = await response.json();
    } catch (error) {
      throw new OpenAIRequestError(`OpenAI response is not JSON: ${errorMessage(error)}`, response.status, true);
    }

    const parsed = chatCompletionResponseSchema.safeParse(body);
    if (!parsed.success) {
      throw new OpenAIRequestError('OpenAI response has no choices', response.status, false);
    }

    const content = parsed.data.choices[0].message.content;
    if (!content) {
      throw new OpenAIRequestError('OpenAI returned an empty completion', response.status, true);
    }
    return content;
  }

  private getMaxTokens(): number {
    const model = this.config.model;

    if (model.includes('gpt-3.5')) {
      return 2000;
    } else if (model.includes('gpt-4')) {
      return 4000;
    }
    return 3000;
  }
}
