/**
 * Environment configuration.
 * Read once at startup; every missing or malformed variable is reported
 * together.
 */

import { isLogLevel, type LogLevel } from './providers/ILogProvider.js';
import {
  DEFAULT_EMBEDDING_DIMENSIONS,
  DEFAULT_EMBEDDING_MODEL,
} from './providers/OpenAIEmbeddingProvider.js';
import { DEFAULT_SYNTHESIS_MODEL } from './providers/OpenAISynthesisProvider.js';
import { DEFAULT_KNOWLEDGE_RESULTS } from './services/RecommendationService.js';

export type SynthesisMode = 'openai' | 'heuristic';

export interface AppConfig {
  supabase: { url: string; serviceRoleKey: string };
  openai: { apiKey: string };
  embedding: { model: string; dimensions: number };
  synthesis: { mode: SynthesisMode; model: string; knowledgeResults: number };
  logging: {
    level: LogLevel;
    axiom: { apiToken: string; dataset: string } | null;
  };
}

type Env = Record<string, string | undefined>;

const REQUIRED = ['SUPABASE_URL', 'SUPABASE_SERVICE_ROLE_KEY', 'OPENAI_API_KEY'] as const;

export function loadConfig(env: Env = process.env): AppConfig {
  const problems: string[] = [];

  const missing = REQUIRED.filter((name) => !env[name]);
  if (missing.length > 0) {
    problems.push(`missing ${missing.join(', ')}`);
  }

  const integer = (name: string, fallback: number, min: number): number => {
    const raw = env[name];
    if (raw === undefined || raw === '') return fallback;
    const value = Number(raw);
    if (!Number.isInteger(value) || value < min) {
      problems.push(`${name} must be an integer >= ${min}`);
      return fallback;
    }
    return value;
  };

  const dimensions = integer('EMBEDDING_DIMENSIONS', DEFAULT_EMBEDDING_DIMENSIONS, 1);
  const knowledgeResults = integer('KNOWLEDGE_RESULTS', DEFAULT_KNOWLEDGE_RESULTS, 0);

  const mode = env.SYNTHESIS_MODE ?? 'openai';
  if (mode !== 'openai' && mode !== 'heuristic') {
    problems.push('SYNTHESIS_MODE must be "openai" or "heuristic"');
  }

  const level = env.LOG_LEVEL ?? 'info';
  if (!isLogLevel(level)) {
    problems.push('LOG_LEVEL must be one of debug, info, warn, error');
  }

  if (problems.length > 0) {
    throw new Error(`Invalid environment: ${problems.join('; ')}`);
  }

  const axiomToken = env.AXIOM_API_KEY;
  const axiomDataset = env.AXIOM_DATASET;

  return {
    supabase: {
      url: env.SUPABASE_URL ?? '',
      serviceRoleKey: env.SUPABASE_SERVICE_ROLE_KEY ?? '',
    },
    openai: { apiKey: env.OPENAI_API_KEY ?? '' },
    embedding: {
      model: env.EMBEDDING_MODEL || DEFAULT_EMBEDDING_MODEL,
      dimensions,
    },
    synthesis: {
      mode: mode === 'heuristic' ? 'heuristic' : 'openai',
      model: env.SYNTHESIS_MODEL || DEFAULT_SYNTHESIS_MODEL,
      knowledgeResults,
    },
    logging: {
      level: isLogLevel(level) ? level : 'info',
      axiom:
        axiomToken && axiomDataset
          ? { apiToken: axiomToken, dataset: axiomDataset }
          : null,
    },
  };
}
