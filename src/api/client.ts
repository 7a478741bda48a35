import { explanationFailure } from '../explain/types';
import type { ExplanationRequest, ExplanationResult } from '../explain/types';
import { PASSWORD_HEADER, errorResponseSchema, explanationResultSchema, serverInfoSchema } from './schemas';
import type { ServerInfo } from './schemas';

async function errorMessageOf(res: Response, fallback: string): Promise<string> {
  try {
    const parsed = errorResponseSchema.safeParse(await res.json());
    return parsed.success ? parsed.data.message : fallback;
  } catch {
    return fallback;
  }
}

export async function fetchServerInfo(): Promise<ServerInfo> {
  const res = await fetch('/api/config');
  if (!res.ok) {
    throw new Error(await errorMessageOf(res, 'Failed to reach the server'));
  }
  return serverInfoSchema.parse(await res.json());
}

/** Resolves to false when the password is rejected. */
export async function login(password: string): Promise<boolean> {
  const res = await fetch('/api/login', {
    method: 'POST',
    headers: { 'Content-Type': 'application/json' },
    body: JSON.stringify({ password }),
  });
  if (res.status === 401) return false;
  if (!res.ok) {
    throw new Error(await errorMessageOf(res, 'Login failed'));
  }
  return true;
}

export interface ExplainOptions {
  password: string | null;
  apiKey: string | null;
  /** Reported as the model when the server could not be reached */
  model: string;
  signal?: AbortSignal;
}

/** Ask the server for an explanation. Every failure comes back as a failed result. */
export async function requestExplanation(
  request: ExplanationRequest,
  { password, apiKey, model, signal }: ExplainOptions,
): Promise<ExplanationResult> {
  const headers: Record<string, string> = { 'Content-Type': 'application/json' };
  if (password) headers[PASSWORD_HEADER] = password;

  try {
    const res = await fetch('/api/explain', {
      method: 'POST',
      headers,
      body: JSON.stringify({ ...request, apiKey: apiKey || undefined }),
      signal,
    });
    if (!res.ok) {
      return explanationFailure(model, await errorMessageOf(res, `Server responded with ${res.status}`));
    }
    return explanationResultSchema.parse(await res.json());
  } catch (error) {
    console.error('Explanation request error:', error);
    return explanationFailure(
      model,
      error instanceof Error ? `Failed to reach the server: ${error.message}` : 'Failed to reach the server',
    );
  }
}
