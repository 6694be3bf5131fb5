import { dirname, resolve } from "node:path";
import { fileURLToPath } from "node:url";
import { config as loadEnv } from "dotenv";
import { z } from "zod";

const __dirname = dirname(fileURLToPath(import.meta.url));
loadEnv({ path: resolve(__dirname, "../../../.env") });

const envSchema = z.object({
  NODE_ENV: z.enum(["development", "test", "production"]).default("development"),
  PORT: z.coerce.number().int().positive().default(3001),
  CORS_ORIGIN: z.string().default("http://localhost:5173"),
  RATE_LIMIT_WINDOW_MS: z.coerce.number().int().positive().default(60_000),
  RATE_LIMIT_MAX: z.coerce.number().int().positive().default(100),
  LOG_LEVEL: z.enum(["fatal", "error", "warn", "info", "debug", "trace", "silent"]).default("info"),
  EXTRACTION_STORE_DIR: z.string().default("data/extractions"),
  UPLOAD_DB_PATH: z.string().default("data/uploads.db"),
  NEED_SCORE_THRESHOLD: z.coerce.number().min(0).max(1).default(0.3),
  SIMILARITY_THRESHOLD: z.coerce.number().min(0).max(1).default(0.5),
  SIMILARITY_PROVIDER: z.enum(["lexical", "llm", "disabled"]).default("lexical"),
  UPLOAD_MAX_ATTEMPTS: z.coerce.number().int().positive().default(5),
  UPLOAD_RETRY_DELAY_MS: z.coerce.number().int().min(0).default(1000),
  UPLOAD_TIMEOUT_MS: z.coerce.number().int().positive().default(30_000),
  UPLOAD_CALL_RETRIES: z.coerce.number().int().min(0).default(2),
  UPLOAD_CUSTOMER_CONCURRENCY: z.coerce.number().int().positive().default(4),
  METRICS_PREFIX: z.string().default("customer_graph"),
  NEO4J_URI: z.string().default("bolt://localhost:7687"),
  NEO4J_USER: z.string().default("neo4j"),
  NEO4J_PASSWORD: z.string().default(""),
  NEO4J_DATABASE: z.string().default("neo4j"),
  LLM_API_KEY: z.string().default(""),
  LLM_BASE_URL: z.string().default("https://api.openai.com/v1"),
  LLM_CHAT_MODEL: z.string().default("gpt-4o-mini"),
  LLM_MAX_CONCURRENT: z.coerce.number().int().positive().default(5),
  LLM_MAX_RETRIES: z.coerce.number().int().min(0).default(3),
  LLM_RETRY_DELAY_MS: z.coerce.number().int().positive().default(1000),
  LLM_REQUESTS_PER_MINUTE: z.coerce.number().int().positive().default(30),
  LLM_TIMEOUT_MS: z.coerce.number().int().positive().default(60_000)
});

export type AppConfig = z.infer<typeof envSchema>;
export const appConfig: AppConfig = envSchema.parse(process.env);
