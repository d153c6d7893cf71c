import 'dotenv/config';

function intFromEnv(name: string, fallback: number): number {
  const raw = process.env[name];
  if (!raw) return fallback;
  const n = Number.parseInt(raw, 10);
  return Number.isFinite(n) && n > 0 ? n : fallback;
}

export const config = {
  port: intFromEnv('PORT', 3000),
  graphPath: process.env.GRAPH_PATH || 'knowledge-base/plant_disease_graph.json',
  maxCandidates: intFromEnv('MAX_CANDIDATES', 8),
  redis: {
    enabled: process.env.REDIS_ENABLED === 'true',
    url: process.env.REDIS_URL || null
  },
  llm: {
    baseURL: process.env.LLM_BASE_URL || 'http://localhost:11434/v1',
    model: process.env.LLM_MODEL || 'gemma3n:e4b',
    apiKey: process.env.LLM_API_KEY || 'ollama',
    timeoutMs: intFromEnv('LLM_TIMEOUT_MS', 60_000)
  }
};

export type AppConfig = typeof config;
