import OpenAI, { APIConnectionTimeoutError, APIError, AuthenticationError } from 'openai';
import { ConfigurationError, ExplanationRequestError } from '../../src/errors';
import { buildPrompt } from '../../src/explain/prompt';
import { explanationFailure } from '../../src/explain/types';
import type { ExplanationRequest, ExplanationResult } from '../../src/explain/types';
import type { ExplanationConfig } from '../config';
import { log } from '../log';

export interface CompletionRequest {
  apiKey: string;
  model: string;
  prompt: string;
  maxTokens: number;
  temperature: number;
}

/** One outbound text-generation call. Resolves to the raw completion text. */
export type CompletionTransport = (request: CompletionRequest, signal: AbortSignal) => Promise<string>;

export interface ExplainCallOptions {
  /** Overrides the configured key for this call */
  apiKey?: string;
  signal?: AbortSignal;
}

export interface ExplanationRequester {
  readonly model: string;
  explain(request: ExplanationRequest, options?: ExplainCallOptions): Promise<ExplanationResult>;
}

/**
 * Chat-completions transport. The SDK gets one retry, which it only spends
 * on connection errors, 408/409/429 and 5xx responses.
 */
export function createOpenAITransport(config: Pick<ExplanationConfig, 'baseUrl' | 'timeoutMs'>): CompletionTransport {
  return async (request, signal) => {
    const openai = new OpenAI({
      apiKey: request.apiKey,
      baseURL: config.baseUrl ?? undefined,
      timeout: config.timeoutMs,
      maxRetries: 1,
    });

    const completion = await openai.chat.completions.create(
      {
        model: request.model,
        messages: [{ role: 'user', content: request.prompt }],
        max_tokens: request.maxTokens,
        temperature: request.temperature,
      },
      { signal },
    );

    return completion.choices[0]?.message?.content ?? '';
  };
}

export function describeRequestError(error: unknown): string {
  if (error instanceof ExplanationRequestError) return error.message;
  if (error instanceof APIConnectionTimeoutError) return 'The explanation service did not respond in time.';
  if (error instanceof AuthenticationError) {
    return 'Authentication with the explanation service failed. Check the API key.';
  }
  if (error instanceof APIError) {
    return `The explanation service returned an error${error.status ? ` (${error.status})` : ''}: ${error.message}`;
  }
  if (error instanceof Error) return `Failed to query the explanation service: ${error.message}`;
  return `Failed to query the explanation service: ${String(error)}`;
}

/** Run `call` with its own abort signal, giving up after `timeoutMs` whether or not `call` listens. */
async function withDeadline<T>(
  call: (signal: AbortSignal) => Promise<T>,
  timeoutMs: number,
  outer?: AbortSignal,
): Promise<T> {
  if (outer?.aborted) {
    throw new ExplanationRequestError('cancelled', 'The explanation request was cancelled.');
  }

  const controller = new AbortController();
  const deadline = new Promise<never>((_resolve, reject) => {
    controller.signal.addEventListener('abort', () => reject(controller.signal.reason), { once: true });
  });

  const timer = setTimeout(() => {
    controller.abort(
      new ExplanationRequestError('timeout', `The explanation request timed out after ${timeoutMs} ms.`),
    );
  }, timeoutMs);
  const onAbort = () => {
    controller.abort(new ExplanationRequestError('cancelled', 'The explanation request was cancelled.'));
  };
  outer?.addEventListener('abort', onAbort, { once: true });

  try {
    return await Promise.race([call(controller.signal), deadline]);
  } finally {
    clearTimeout(timer);
    outer?.removeEventListener('abort', onAbort);
  }
}

export function createExplanationRequester(
  config: ExplanationConfig,
  transport: CompletionTransport = createOpenAITransport(config),
): ExplanationRequester {
  let warnedMissingKey = false;

  return {
    model: config.model,

    async explain(request, options = {}) {
      const apiKey = options.apiKey ?? config.apiKey;
      if (!apiKey) {
        const error = new ConfigurationError(
          'No OpenAI API key configured. Set OPENAI_API_KEY on the server or enter a key in Settings.',
        );
        if (!warnedMissingKey) {
          warnedMissingKey = true;
          log(error.message, 'explain');
        }
        return explanationFailure(config.model, error.message);
      }

      const prompt = buildPrompt(request);
      const started = Date.now();

      try {
        const text = await withDeadline(
          (signal) =>
            transport(
              {
                apiKey,
                model: config.model,
                prompt,
                maxTokens: config.maxTokens,
                temperature: config.temperature,
              },
              signal,
            ),
          config.timeoutMs,
          options.signal,
        );

        if (!text.trim()) {
          throw new ExplanationRequestError('empty-response', 'The explanation service returned an empty response.');
        }

        log(`explanation from ${config.model} in ${Date.now() - started}ms`, 'explain');
        return { success: true, text, modelUsed: config.model };
      } catch (error) {
        const message = describeRequestError(error);
        log(`explanation failed after ${Date.now() - started}ms: ${message}`, 'explain');
        return explanationFailure(config.model, message);
      }
    },
  };
}
