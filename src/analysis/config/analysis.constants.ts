import path from 'node:path';
import { RetrievalPolicy, RetrievalPolicyName } from '../types/analysis.types';

function readNumber(envName: string, fallback: number): number {
  const raw = (process.env[envName] ?? '').trim();
  if (!raw) {
    return fallback;
  }
  const parsed = Number(raw);
  return Number.isFinite(parsed) ? parsed : fallback;
}

const safetyFactorRaw = readNumber('CONTEXT_SAFETY_FACTOR', 0.8);
export const CONTEXT_SAFETY_FACTOR =
  safetyFactorRaw > 0 && safetyFactorRaw < 1 ? safetyFactorRaw : 0.8;

export const TOKENIZER_MODEL = process.env.TOKENIZER_MODEL ?? 'gpt-3.5-turbo';
const fallbackRatioRaw = readNumber('TOKENIZER_FALLBACK_RATIO', 1.3);
export const TOKENIZER_FALLBACK_RATIO =
  fallbackRatioRaw > 0 ? fallbackRatioRaw : 1.3;

export const RETRIEVAL_POLICY: Record<RetrievalPolicyName, RetrievalPolicy> = {
  interactive: {
    minScore: Math.max(0, Math.min(1, readNumber('RETRIEVAL_MIN_SCORE', 0.3))),
    limit: Math.max(1, Math.floor(readNumber('RETRIEVAL_LIMIT', 1000))),
  },
  digest: {
    minScore: Math.max(0, Math.min(1, readNumber('DIGEST_MIN_SCORE', 0.3))),
    limit: Math.max(1, Math.floor(readNumber('DIGEST_RETRIEVAL_LIMIT', 10000))),
  },
};

export const ANALYSIS_CHUNK_CONCURRENCY = Math.max(
  1,
  Math.floor(readNumber('ANALYSIS_CHUNK_CONCURRENCY', 1)),
);

export const CHUNK_SEPARATOR = '\n\n---\n\n';

// Context windows (input tokens) of the completion models this service is run with.
export const MODEL_CONTEXT_SIZES: Record<string, number> = {
  'gpt-3.5-turbo': 16385,
  'gpt-4': 8192,
  'gpt-4-turbo': 128000,
  'gpt-4o': 128000,
  'gpt-4o-mini': 128000,
  'gpt-4.1': 1047576,
  'gpt-4.1-mini': 1047576,
  'gemini-1.5-flash': 1048576,
  'gemini-1.5-pro': 2097152,
  'gemini-2.0-flash': 1048576,
};
export const DEFAULT_CONTEXT_SIZE = 8192;

const dataDir = process.env.DATA_DIR ?? path.join(process.cwd(), 'data');
export const SUBSCRIPTIONS_JSON =
  process.env.SUBSCRIPTIONS_JSON ?? path.join(dataDir, 'subscriptions.json');

export const DIGEST_DEFAULT_QUERY =
  process.env.DIGEST_DEFAULT_QUERY ??
  'Summarize the key news, releases and market events of the day and what they mean for the category.';
