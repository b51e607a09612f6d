/**
 * Immutable pipeline configuration
 *
 * Built once at the entry point from the validated environment (and an optional
 * projects file) and passed down explicitly; components never read process.env.
 */

import { readFileSync } from "node:fs";
import { z } from "zod";
import type { Env } from "./env.js";
import type { RiskLevel } from "../types/index.js";
import { ConfigurationError, errorMessage } from "../errors.js";

export interface TestRailSettings {
  url: string;
  email: string;
  apiKey: string;
  projectId: number;
  suiteId?: number;
  sectionId: number;

  /**
   * Custom case field holding the automation key
   */
  automationField: string;

  timeoutMs: number;
}

export interface ProjectProfile {
  key: string;
  projectName: string;
  projectId: number;
  suiteId?: number;
  sectionId: number;
  sectionName?: string;
  qaName?: string;
  qaEmail?: string;
}

export interface BuildInfo {
  buildNumber: string;
  branch: string;
  commitSha?: string;
  commitMessage?: string;
  jiraIssue?: string;
  environment: string;
  actor?: string;
  prNumber?: number;
}

export interface SyncSettings {
  maxAttempts: number;
  backoffMs: number;
  concurrency: number;
}

export interface RiskThresholds {
  low: number;
  medium: number;
}

export interface HistorySettings {
  dbPath: string;
  maxEntries: number;
  days?: number;
  flakyThreshold: number;

  /**
   * Log every SQL statement at debug level
   */
  logQueries: boolean;
}

export interface LlmSettings {
  provider: "openai" | "anthropic" | "openrouter";
  apiKey: string;
  model: string;
  maxTokens: number;
  temperature: number;
  baseUrl?: string;
}

export interface SlackSettings {
  webhookUrl: string;
  channel?: string;
  username?: string;
  iconEmoji?: string;
}

export interface ServerSettings {
  port: number;
  host: string;
  enableCors: boolean;
  enableHelmet: boolean;
  enableRequestLogging: boolean;
  corsOrigins: string | string[];
}

export interface PipelineConfig {
  testRail?: TestRailSettings;
  project?: ProjectProfile;
  sync: SyncSettings;
  risk: RiskThresholds;
  qualityGate?: { maxRisk: RiskLevel };
  history?: HistorySettings;
  llm?: LlmSettings;
  slack?: SlackSettings;
  build: BuildInfo;
  server: ServerSettings;
}

export interface PipelineConfigOverrides {
  projectKey?: string;
  branch?: string;
  historyDbPath?: string;
}

const projectsFileSchema = z.object({
  projects: z.record(
    z.object({
      projectName: z.string().min(1),
      projectId: z.number().int().positive(),
      suiteId: z.number().int().positive().optional(),
      sectionId: z.number().int().positive(),
      sectionName: z.string().optional(),
      qaName: z.string().optional(),
      qaEmail: z.string().email().optional(),
    })
  ),
});

/**
 * Load the multi-project file (`{ "projects": { "<key>": {...} } }`)
 */
export function loadProjectProfiles(path: string): Map<string, ProjectProfile> {
  let raw: unknown;
  try {
    raw = JSON.parse(readFileSync(path, "utf-8"));
  } catch (error) {
    throw new ConfigurationError(`Cannot read projects file ${path}: ${errorMessage(error)}`);
  }

  const parsed = projectsFileSchema.safeParse(raw);
  if (!parsed.success) {
    const issues = parsed.error.issues.map((i) => `${i.path.join(".")}: ${i.message}`).join("; ");
    throw new ConfigurationError(`Invalid projects file ${path}: ${issues}`);
  }

  const profiles = new Map<string, ProjectProfile>();
  for (const [key, profile] of Object.entries(parsed.data.projects)) {
    profiles.set(key, { key, ...profile });
  }
  return profiles;
}

function deepFreeze<T>(value: T): T {
  if (value !== null && typeof value === "object" && !Object.isFrozen(value)) {
    for (const nested of Object.values(value)) {
      deepFreeze(nested);
    }
    Object.freeze(value);
  }
  return value;
}

function splitOrigins(origins: string): string | string[] {
  if (origins === "*") {
    return origins;
  }
  return origins.split(",").map((o) => o.trim()).filter((o) => o.length > 0);
}

/**
 * Build the frozen configuration value handed to the pipeline
 */
export function buildPipelineConfig(
  env: Env,
  overrides: PipelineConfigOverrides = {},
  profiles?: Map<string, ProjectProfile>
): PipelineConfig {
  let project: ProjectProfile | undefined;
  if (overrides.projectKey) {
    const available = profiles ?? (env.TESTRAIL_PROJECTS_FILE ? loadProjectProfiles(env.TESTRAIL_PROJECTS_FILE) : undefined);
    project = available?.get(overrides.projectKey);
    if (!project) {
      const known = available ? Array.from(available.keys()).join(", ") : "none";
      throw new ConfigurationError(`Unknown project "${overrides.projectKey}" (known: ${known})`);
    }
  }

  const projectId = project?.projectId ?? env.TESTRAIL_PROJECT_ID;
  const sectionId = project?.sectionId ?? env.TESTRAIL_SECTION_ID;

  const testRail: TestRailSettings | undefined =
    env.TESTRAIL_URL && env.TESTRAIL_EMAIL && env.TESTRAIL_API_KEY && projectId && sectionId
      ? {
          url: env.TESTRAIL_URL.replace(/\/+$/, ""),
          email: env.TESTRAIL_EMAIL,
          apiKey: env.TESTRAIL_API_KEY,
          projectId,
          suiteId: project?.suiteId ?? env.TESTRAIL_SUITE_ID,
          sectionId,
          automationField: env.TESTRAIL_AUTOMATION_FIELD,
          timeoutMs: env.TESTRAIL_TIMEOUT_MS,
        }
      : undefined;

  if (env.RISK_MEDIUM_THRESHOLD > env.RISK_LOW_THRESHOLD) {
    throw new ConfigurationError(
      `RISK_MEDIUM_THRESHOLD (${env.RISK_MEDIUM_THRESHOLD}) must not exceed RISK_LOW_THRESHOLD (${env.RISK_LOW_THRESHOLD})`
    );
  }

  const historyDbPath = overrides.historyDbPath ?? env.HISTORY_DB_PATH;

  const config: PipelineConfig = {
    testRail,
    project,
    sync: {
      maxAttempts: env.SYNC_MAX_RETRIES,
      backoffMs: env.SYNC_RETRY_BACKOFF_MS,
      concurrency: env.SYNC_CONCURRENCY,
    },
    risk: {
      low: env.RISK_LOW_THRESHOLD,
      medium: env.RISK_MEDIUM_THRESHOLD,
    },
    qualityGate: env.QUALITY_GATE_MAX_RISK ? { maxRisk: env.QUALITY_GATE_MAX_RISK } : undefined,
    history: historyDbPath
      ? {
          dbPath: historyDbPath,
          maxEntries: env.HISTORY_WINDOW_RUNS,
          days: env.HISTORY_WINDOW_DAYS,
          flakyThreshold: env.FLAKY_THRESHOLD,
          logQueries: env.HISTORY_LOG_QUERIES,
        }
      : undefined,
    llm: env.LLM_API_KEY
      ? {
          provider: env.LLM_PROVIDER,
          apiKey: env.LLM_API_KEY,
          model: env.LLM_MODEL,
          maxTokens: env.LLM_MAX_TOKENS,
          temperature: env.LLM_TEMPERATURE,
          baseUrl: env.LLM_API_BASE,
        }
      : undefined,
    slack:
      env.SLACK_WEBHOOK_URL && env.NOTIFICATION_ENABLED
        ? {
            webhookUrl: env.SLACK_WEBHOOK_URL,
            channel: env.SLACK_CHANNEL,
            username: env.SLACK_USERNAME,
            iconEmoji: env.SLACK_ICON_EMOJI,
          }
        : undefined,
    build: {
      buildNumber: env.BUILD_NUMBER,
      branch: overrides.branch ?? env.BRANCH_NAME,
      commitSha: env.COMMIT_SHA,
      commitMessage: env.COMMIT_MESSAGE,
      jiraIssue: env.JIRA_ISSUE,
      environment: env.TEST_ENVIRONMENT,
      actor: env.GITHUB_ACTOR,
      prNumber: env.PR_NUMBER,
    },
    server: {
      port: env.API_PORT,
      host: env.API_HOST,
      enableCors: env.API_ENABLE_CORS,
      enableHelmet: env.API_ENABLE_HELMET,
      enableRequestLogging: env.API_ENABLE_REQUEST_LOGGING,
      corsOrigins: splitOrigins(env.API_CORS_ORIGINS),
    },
  };

  return deepFreeze(config);
}

/**
 * TestRail settings, or a ConfigurationError naming what is missing
 */
export function requireTestRail(config: PipelineConfig): TestRailSettings {
  if (!config.testRail) {
    throw new ConfigurationError(
      "TestRail is not configured: set TESTRAIL_URL, TESTRAIL_EMAIL, TESTRAIL_API_KEY, " +
        "TESTRAIL_PROJECT_ID and TESTRAIL_SECTION_ID (or select a project with --project)"
    );
  }
  return config.testRail;
}
