/**
 * Application configuration, read once from the environment.
 * Missing credentials and malformed numbers fail at startup rather than on the
 * first request that needs them.
 */

export type EmbeddingProviderName = 'openai' | 'voyage';

export interface MatchingConfig {
  topK: number;
  maxServices: number;
  existingThreshold: number;
  developThreshold: number;
}

export interface GapConfig {
  lowConfidence: number;
  limit: number;
}

export interface AppConfig {
  port: number;
  supabase: { url: string; serviceRoleKey: string };
  embedding: { provider: EmbeddingProviderName; apiKey: string };
  categorization: { apiKey: string; baseUrl: string; model: string };
  axiom: { apiToken: string; dataset: string } | null;
  adminEmails: string[];
  matching: MatchingConfig;
  gaps: GapConfig;
}

export const DEFAULT_MATCHING: MatchingConfig = {
  topK: 10,
  maxServices: 5,
  existingThreshold: 0.6,
  developThreshold: 0.3,
};

export const DEFAULT_GAPS: GapConfig = {
  lowConfidence: 0.3,
  limit: 5,
};

const DEFAULT_OPENROUTER_URL = 'https://openrouter.ai/api/v1';
const DEFAULT_AI_MODEL = 'qwen/qwen3-32b';

type Env = Record<string, string | undefined>;

export function loadConfig(env: Env = process.env): AppConfig {
  const missing: string[] = [];
  const required = (name: string): string => {
    const value = env[name]?.trim();
    if (!value) {
      missing.push(name);
      return '';
    }
    return value;
  };

  const provider = parseEmbeddingProvider(env.EMBEDDING_PROVIDER);
  const embeddingKeyVar = provider === 'openai' ? 'OPENAI_API_KEY' : 'VOYAGE_API_KEY';

  const supabase = {
    url: required('SUPABASE_URL'),
    serviceRoleKey: required('SUPABASE_SERVICE_ROLE_KEY'),
  };
  const embedding = { provider, apiKey: required(embeddingKeyVar) };
  const categorization = {
    apiKey: required('OPENROUTER_API_KEY'),
    baseUrl: env.OPENROUTER_BASE_URL?.trim() || DEFAULT_OPENROUTER_URL,
    model: env.AI_MODEL?.trim() || DEFAULT_AI_MODEL,
  };

  if (missing.length > 0) {
    throw new Error(`Missing required environment variables: ${missing.join(', ')}`);
  }

  const axiomToken = env.AXIOM_API_KEY?.trim();
  const axiomDataset = env.AXIOM_DATASET?.trim();

  const matching: MatchingConfig = {
    topK: parseInteger(env, 'MATCH_TOP_K', DEFAULT_MATCHING.topK, 1),
    maxServices: parseInteger(env, 'MATCH_MAX_SERVICES', DEFAULT_MATCHING.maxServices, 1),
    existingThreshold: parseFraction(env, 'MATCH_EXISTING_THRESHOLD', DEFAULT_MATCHING.existingThreshold),
    developThreshold: parseFraction(env, 'MATCH_DEVELOP_THRESHOLD', DEFAULT_MATCHING.developThreshold),
  };

  if (matching.developThreshold > matching.existingThreshold) {
    throw new Error(
      `MATCH_DEVELOP_THRESHOLD (${matching.developThreshold}) must not exceed MATCH_EXISTING_THRESHOLD (${matching.existingThreshold})`
    );
  }

  return {
    port: parseInteger(env, 'PORT', 8000, 1),
    supabase,
    embedding,
    categorization,
    axiom: axiomToken && axiomDataset ? { apiToken: axiomToken, dataset: axiomDataset } : null,
    adminEmails: (env.ADMIN_EMAILS ?? '')
      .split(',')
      .map((e) => e.trim().toLowerCase())
      .filter((e) => e.length > 0),
    matching,
    gaps: {
      lowConfidence: parseFraction(env, 'GAP_LOW_CONFIDENCE', DEFAULT_GAPS.lowConfidence),
      limit: parseInteger(env, 'GAP_LIMIT', DEFAULT_GAPS.limit, 1),
    },
  };
}

// ── Parsing helpers ──

function parseEmbeddingProvider(value: string | undefined): EmbeddingProviderName {
  const normalized = value?.trim().toLowerCase() || 'openai';
  if (normalized === 'openai' || normalized === 'voyage') return normalized;
  throw new Error(`EMBEDDING_PROVIDER must be "openai" or "voyage", got "${value}"`);
}

function parseInteger(env: Env, name: string, fallback: number, min: number): number {
  const raw = env[name]?.trim();
  if (!raw) return fallback;
  const value = Number(raw);
  if (!Number.isInteger(value) || value < min) {
    throw new Error(`${name} must be an integer >= ${min}, got "${raw}"`);
  }
  return value;
}

function parseFraction(env: Env, name: string, fallback: number): number {
  const raw = env[name]?.trim();
  if (!raw) return fallback;
  const value = Number(raw);
  if (!Number.isFinite(value) || value < 0 || value > 1) {
    throw new Error(`${name} must be a number between 0 and 1, got "${raw}"`);
  }
  return value;
}
