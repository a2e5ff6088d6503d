import 'dotenv/config';

export type GenerationProvider = 'openrouter' | 'gemini';

export interface AppConfig {
  port: number;
  authKey: string;
  generation: {
    provider: GenerationProvider;
    apiKey?: string;
    model: string;
    timeoutMs: number;
    maxTokens: number;
  };
  collector: {
    url: string;
    timeoutMs: number;
  };
  finalizeMinArtifacts: number;
  historyWindow: number;
  sessionTtlMs: number;
  sessionSweepMs: number;
}

export const DEFAULT_AUTH_KEY = 'CHANGE_ME';
export const DEFAULT_COLLECTOR_URL = 'https://hackathon.guvi.in/api/updateHoneyPotFinalResult';

const DEFAULT_MODELS: Record<GenerationProvider, string> = {
  openrouter: 'google/gemini-2.0-flash-001',
  gemini: 'gemini-2.0-flash',
};

function intFrom(raw: string | undefined, fallback: number, min = 0): number {
  if (raw === undefined || raw.trim() === '') return fallback;
  const value = Number.parseInt(raw, 10);
  return Number.isFinite(value) && value >= min ? value : fallback;
}

function providerFrom(raw: string | undefined): GenerationProvider {
  return raw?.toLowerCase() === 'gemini' ? 'gemini' : 'openrouter';
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const provider = providerFrom(env.GENERATION_PROVIDER);
  // Only four artifact categories count towards finalize.
  const minArtifacts = Math.min(4, Math.max(1, intFrom(env.FINALIZE_MIN_ARTIFACTS, 3)));

  return {
    port: intFrom(env.PORT, 8080),
    authKey: env.AUTH_KEY || DEFAULT_AUTH_KEY,
    generation: {
      provider,
      apiKey: env.API_KEY || undefined,
      model: env.AI_MODEL || DEFAULT_MODELS[provider],
      timeoutMs: intFrom(env.AI_TIMEOUT_MS, 4000, 1),
      maxTokens: intFrom(env.AI_MAX_TOKENS, 1000),
    },
    collector: {
      url: env.COLLECTOR_URL || DEFAULT_COLLECTOR_URL,
      timeoutMs: intFrom(env.COLLECTOR_TIMEOUT_MS, 5000, 1),
    },
    finalizeMinArtifacts: minArtifacts,
    historyWindow: intFrom(env.HISTORY_WINDOW, 6),
    sessionTtlMs: intFrom(env.SESSION_TTL_MS, 0),
    sessionSweepMs: intFrom(env.SESSION_SWEEP_MS, 60000, 1),
  };
}
