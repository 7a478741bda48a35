import { ConfigurationError } from '../src/errors';

export interface ExplanationConfig {
  apiKey: string | null;
  model: string;
  baseUrl: string | null;
  timeoutMs: number;
  maxTokens: number;
  temperature: number;
}

export interface AppConfig {
  port: number;
  /** Shared access password; null disables the gate */
  accessPassword: string | null;
  explanation: ExplanationConfig;
}

export type Env = Record<string, string | undefined>;

export const DEFAULT_MODEL = 'gpt-4o-mini';

function readString(env: Env, name: string): string | null {
  const raw = env[name]?.trim();
  return raw ? raw : null;
}

function readNumber(env: Env, name: string, fallback: number, min: number, max: number): number {
  const raw = env[name];
  if (!raw) return fallback;
  const parsed = Number(raw);
  return Number.isFinite(parsed) && parsed >= min && parsed <= max ? parsed : fallback;
}

/** Read once at startup; the result is frozen and passed around explicitly. */
export function loadConfig(env: Env = process.env): Readonly<AppConfig> {
  return Object.freeze({
    port: Math.trunc(readNumber(env, 'PORT', 5000, 0, 65535)),
    accessPassword: readString(env, 'DEBUG_ASSISTANT_PASSWORD'),
    explanation: Object.freeze({
      apiKey: readString(env, 'OPENAI_API_KEY'),
      model: readString(env, 'OPENAI_MODEL') ?? DEFAULT_MODEL,
      baseUrl: readString(env, 'OPENAI_BASE_URL'),
      timeoutMs: readNumber(env, 'EXPLANATION_TIMEOUT_MS', 30_000, 1, 600_000),
      maxTokens: Math.trunc(readNumber(env, 'OPENAI_MAX_TOKENS', 1000, 1, 32_000)),
      temperature: readNumber(env, 'OPENAI_TEMPERATURE', 0.3, 0, 2),
    }),
  });
}

/** Problems worth a warning at startup. None of them stop the server. */
export function configurationWarnings(config: AppConfig): ConfigurationError[] {
  const warnings: ConfigurationError[] = [];
  if (!config.accessPassword) {
    warnings.push(
      new ConfigurationError('DEBUG_ASSISTANT_PASSWORD is not set; the app is open to anyone who can reach it'),
    );
  }
  if (!config.explanation.apiKey) {
    warnings.push(
      new ConfigurationError(
        'OPENAI_API_KEY is not set; explanations need a key entered in the browser settings',
      ),
    );
  }
  return warnings;
}
