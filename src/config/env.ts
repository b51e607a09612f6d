import dotenv from "dotenv";
import { z } from "zod";
import { ConfigurationError } from "../errors.js";

// Load environment variables from .env files
// Priority: .env.<env>.local > .env.<env> > .env.local > .env
const nodeEnv = process.env.NODE_ENV || "development";
const envFiles = [`.env.${nodeEnv}.local`, `.env.${nodeEnv}`, ".env.local", ".env"];

for (const file of envFiles) {
  dotenv.config({ path: file });
}

const booleanFlag = (fallback: "true" | "false") =>
  z
    .string()
    .default(fallback)
    .transform((v) => v === "true");

const optionalId = z.coerce.number().int().positive().optional();

// Blank values from CI secrets behave as unset
const emptyAsUndefined = (value: unknown) =>
  typeof value === "string" && value.trim() === "" ? undefined : value;

const riskLevel = z.enum(["LOW", "MEDIUM", "CRITICAL"]);

// Define the environment variable schema
const envSchema = z
  .object({
    NODE_ENV: z.enum(["development", "test", "production"]).default("development"),

    // TestRail
    TESTRAIL_URL: z.preprocess(emptyAsUndefined, z.string().trim().url().optional()),
    TESTRAIL_EMAIL: z.preprocess(emptyAsUndefined, z.string().trim().optional()),
    TESTRAIL_API_KEY: z.preprocess(emptyAsUndefined, z.string().trim().optional()),
    TESTRAIL_PROJECT_ID: z.preprocess(emptyAsUndefined, optionalId),
    TESTRAIL_SUITE_ID: z.preprocess(emptyAsUndefined, optionalId),
    TESTRAIL_SECTION_ID: z.preprocess(emptyAsUndefined, optionalId),
    TESTRAIL_AUTOMATION_FIELD: z.string().default("custom_automation_id"),
    TESTRAIL_TIMEOUT_MS: z.coerce.number().int().positive().default(30000),
    TESTRAIL_PROJECTS_FILE: z.preprocess(emptyAsUndefined, z.string().optional()),

    // Sync behaviour
    SYNC_MAX_RETRIES: z.coerce.number().int().min(1).default(3),
    SYNC_RETRY_BACKOFF_MS: z.coerce.number().int().min(0).default(1000),
    SYNC_CONCURRENCY: z.coerce.number().int().positive().default(4),

    // Risk classification and optional CI gate
    RISK_LOW_THRESHOLD: z.coerce.number().min(0).max(100).default(95),
    RISK_MEDIUM_THRESHOLD: z.coerce.number().min(0).max(100).default(80),
    QUALITY_GATE_MAX_RISK: z.preprocess(emptyAsUndefined, riskLevel.optional()),

    // History store
    HISTORY_DB_PATH: z.preprocess(emptyAsUndefined, z.string().optional()),
    HISTORY_WINDOW_RUNS: z.coerce.number().int().positive().default(10),
    HISTORY_WINDOW_DAYS: z.preprocess(emptyAsUndefined, z.coerce.number().int().positive().optional()),
    FLAKY_THRESHOLD: z.coerce.number().min(0).max(1).default(0.3),
    HISTORY_LOG_QUERIES: booleanFlag("false"),

    // LLM narrative
    LLM_PROVIDER: z.enum(["openai", "anthropic", "openrouter"]).default("openai"),
    LLM_API_KEY: z.preprocess(emptyAsUndefined, z.string().optional()),
    LLM_MODEL: z.string().default("gpt-4o-mini"),
    LLM_MAX_TOKENS: z.coerce.number().int().positive().default(1200),
    LLM_TEMPERATURE: z.coerce.number().min(0).max(2).default(0.3),
    LLM_API_BASE: z.preprocess(emptyAsUndefined, z.string().url().optional()),

    // Slack
    SLACK_WEBHOOK_URL: z.preprocess(emptyAsUndefined, z.string().url().optional()),
    SLACK_CHANNEL: z.preprocess(emptyAsUndefined, z.string().optional()),
    SLACK_USERNAME: z.preprocess(emptyAsUndefined, z.string().optional()),
    SLACK_ICON_EMOJI: z.preprocess(emptyAsUndefined, z.string().optional()),
    NOTIFICATION_ENABLED: booleanFlag("true"),

    // Build metadata (CI)
    BUILD_NUMBER: z.string().default("local"),
    BRANCH_NAME: z.string().default("main"),
    COMMIT_SHA: z.preprocess(emptyAsUndefined, z.string().optional()),
    COMMIT_MESSAGE: z.preprocess(emptyAsUndefined, z.string().optional()),
    JIRA_ISSUE: z.preprocess(emptyAsUndefined, z.string().optional()),
    TEST_ENVIRONMENT: z.string().default("dev"),
    GITHUB_ACTOR: z.preprocess(emptyAsUndefined, z.string().optional()),
    PR_NUMBER: z.preprocess(emptyAsUndefined, z.coerce.number().int().positive().optional()),

    // History API server
    API_PORT: z.coerce.number().int().positive().max(65535).default(3000),
    API_HOST: z.string().default("0.0.0.0"),
    API_ENABLE_CORS: booleanFlag("true"),
    API_ENABLE_HELMET: booleanFlag("true"),
    API_ENABLE_REQUEST_LOGGING: booleanFlag("true"),
    API_CORS_ORIGINS: z.string().default("*"),

    // Logging
    LOG_LEVEL: z.enum(["debug", "info", "warn", "error", "silent"]).default("info"),
    LOG_FILE: z.preprocess(emptyAsUndefined, z.string().optional()),
    LOG_FORMAT: z.enum(["json", "text"]).default("json"),
  })
  .passthrough();

// Type for validated environment variables
export type Env = z.infer<typeof envSchema>;

/**
 * Parse and validate environment variables
 */
export function parseEnv(source: NodeJS.ProcessEnv = process.env): Env {
  const result = envSchema.safeParse(source);

  if (!result.success) {
    const formattedErrors = result.error.issues.map((issue) => {
      const path = issue.path.length > 0 ? issue.path.join(".") : "unknown";
      return `  - ${path}: ${issue.message}`;
    });

    throw new ConfigurationError(
      `Environment variable validation failed:\n${formattedErrors.join("\n")}\n\n` +
        `Please check your .env file or set the required environment variables.`
    );
  }

  return result.data;
}
