import path from 'node:path';
import { z } from 'zod';

const envSchema = z
  .object({
    DATA_DIR: z.string().min(1).default('data'),
    INDEX_STORE: z.enum(['file', 'postgres']).default('file'),
    DATABASE_URL: z.string().url().optional(),
    OPENAI_API_KEY: z.string().default(''),
    EMBEDDING_MODEL: z.string().min(1).default('text-embedding-3-small'),
    TOP_K: z.coerce.number().int().positive().default(10),
    LOG_LEVEL: z.enum(['debug', 'info', 'warn', 'error']).default('info'),
  })
  .superRefine((env, ctx) => {
    if (env.INDEX_STORE === 'postgres' && !env.DATABASE_URL) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['DATABASE_URL'],
        message: 'DATABASE_URL is required when INDEX_STORE is postgres',
      });
    }
  });

export interface Config {
  dataDir: string;
  processedDir: string;
  embeddingsDir: string;
  indexDir: string;
  historyDir: string;
  indexStore: { kind: 'file' } | { kind: 'postgres'; connectionString: string };
  openAiApiKey: string;
  embeddingModel: string;
  topK: number;
  logLevel: 'debug' | 'info' | 'warn' | 'error';
}

export class ConfigError extends Error {
  constructor(public readonly problems: string[]) {
    super(`Invalid configuration:\n${problems.map((problem) => `  - ${problem}`).join('\n')}`);
    this.name = 'ConfigError';
  }
}

// Blank variables count as unset so `.env` templates with empty values fall back to defaults.
function withoutBlanks(env: NodeJS.ProcessEnv): Record<string, string> {
  const cleaned: Record<string, string> = {};
  for (const [key, value] of Object.entries(env)) {
    if (value !== undefined && value.trim() !== '') cleaned[key] = value;
  }
  return cleaned;
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): Config {
  const parsed = envSchema.safeParse(withoutBlanks(env));
  if (!parsed.success) {
    throw new ConfigError(parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`));
  }

  const values = parsed.data;
  const dataDir = path.resolve(values.DATA_DIR);
  return {
    dataDir,
    processedDir: path.join(dataDir, 'processed'),
    embeddingsDir: path.join(dataDir, 'embeddings'),
    indexDir: path.join(dataDir, 'index'),
    historyDir: path.join(dataDir, 'history'),
    indexStore:
      values.INDEX_STORE === 'postgres' && values.DATABASE_URL
        ? { kind: 'postgres', connectionString: values.DATABASE_URL }
        : { kind: 'file' },
    openAiApiKey: values.OPENAI_API_KEY,
    embeddingModel: values.EMBEDDING_MODEL,
    topK: values.TOP_K,
    logLevel: values.LOG_LEVEL,
  };
}
