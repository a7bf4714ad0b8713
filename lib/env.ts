import { config } from "dotenv";
import { z } from "zod";

import { DISCOVERY_CONFIG, MODEL_CONFIG, SERVER_CONFIG } from "./config";

const numberFromEnv = (fallback: number) =>
  z
    .string()
    .trim()
    .optional()
    .transform((value, ctx) => {
      if (value === undefined || value === "") return fallback;
      const parsed = Number(value);
      if (!Number.isFinite(parsed)) {
        ctx.addIssue({ code: z.ZodIssueCode.custom, message: `expected a number, got "${value}"` });
        return z.NEVER;
      }
      return parsed;
    });

const EnvSchema = z.object({
  OPENAI_API_KEY: z.string().optional(),
  FIRECRAWL_API_KEY: z.string().optional(),
  MODEL_NAME: z.string().trim().min(1).default(MODEL_CONFIG.MODEL),
  MAX_TOKENS: numberFromEnv(MODEL_CONFIG.MAX_TOKENS),
  TEMPERATURE: numberFromEnv(MODEL_CONFIG.TEMPERATURE),
  SEARCH_TIMEOUT_MS: numberFromEnv(DISCOVERY_CONFIG.SEARCH_TIMEOUT),
  PORT: numberFromEnv(SERVER_CONFIG.PORT),
  HOST: z.string().trim().min(1).default(SERVER_CONFIG.HOST),
});

export interface EnvConfig {
  openaiApiKey?: string;
  firecrawlApiKey?: string;
  model: {
    name: string;
    maxTokens: number;
    temperature: number;
  };
  search: {
    timeoutMs: number;
  };
  server: {
    port: number;
    host: string;
  };
}

/**
 * Reads configuration from `process.env` (after loading `.env` from the
 * working directory). Throws when a value is present but malformed; API keys
 * are checked by the clients that need them.
 */
export function loadEnvConfig(env: NodeJS.ProcessEnv = loadDotenv()): EnvConfig {
  const result = EnvSchema.safeParse(env);
  if (!result.success) {
    const errorMessages = result.error.issues.map((issue) => {
      const path = issue.path.length > 0 ? issue.path.join(".") : "root";
      return `${path}: ${issue.message}`;
    });
    throw new Error(`Invalid environment configuration: ${errorMessages.join("; ")}`);
  }

  const parsed = result.data;
  return {
    openaiApiKey: parsed.OPENAI_API_KEY || undefined,
    firecrawlApiKey: parsed.FIRECRAWL_API_KEY || undefined,
    model: {
      name: parsed.MODEL_NAME,
      maxTokens: parsed.MAX_TOKENS,
      temperature: parsed.TEMPERATURE,
    },
    search: {
      timeoutMs: parsed.SEARCH_TIMEOUT_MS,
    },
    server: {
      port: parsed.PORT,
      host: parsed.HOST,
    },
  };
}

function loadDotenv(): NodeJS.ProcessEnv {
  config();
  return process.env;
}
