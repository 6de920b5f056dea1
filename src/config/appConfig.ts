import { readFileSync, existsSync } from "node:fs";
import path from "node:path";
import * as z from "zod";

export interface AppConfig {
  flowId?: string;
  flow?: string;
}

export interface ResolvedAppConfig {
  flowId: string | null;
  flowPath: string;
  tenantId: string;
  appId: string;
  port: number;
  backendApiBaseUrl: string;
  telegram: {
    botToken: string | null;
    webhookSecret: string | null;
    apiBaseUrl: string;
  };
  timeouts: {
    profileFetchMs: number;
    storeMs: number;
    summaryMs: number;
    registrationMs: number;
    analysisMs: number;
  };
}

const PROJECT_ROOT = path.resolve(__dirname, "../..");

export const DEFAULT_FLOW_ID = "maternal-registration";

const AppConfigFileSchema = z.object({
  flowId: z.string().min(1).optional(),
  flow: z.string().min(1).optional(),
});

const Milliseconds = (fallback: number) => z.coerce.number().int().positive().default(fallback);
const OptionalSecret = z
  .string()
  .optional()
  .transform((value) => value?.trim() || null);

const EnvSchema = z.object({
  PORT: z.coerce.number().int().positive().default(3000),
  BACKEND_API_BASE_URL: z
    .string()
    .optional()
    .transform((value) => value?.trim() || "http://localhost:8000"),
  TELEGRAM_BOT_TOKEN: OptionalSecret,
  TELEGRAM_WEBHOOK_SECRET: OptionalSecret,
  TELEGRAM_API_BASE_URL: z
    .string()
    .optional()
    .transform((value) => value?.trim() || "https://api.telegram.org"),
  PROFILE_FETCH_TIMEOUT_MS: Milliseconds(10_000),
  STORE_TIMEOUT_MS: Milliseconds(10_000),
  SUMMARY_TIMEOUT_MS: Milliseconds(25_000),
  REGISTRATION_TIMEOUT_MS: Milliseconds(15_000),
  ANALYSIS_TIMEOUT_MS: Milliseconds(60_000),
});

type Env = Record<string, string | undefined>;

function getTenantId(env: Env): string {
  return env.TENANT_ID ?? "default";
}

function getAppId(env: Env): string {
  return env.APP_ID ?? "maternal-care-bot";
}

/**
 * Resolve the path to app.config.json.
 * Priority: APP_CONFIG_PATH env > clients/<tenantId>/apps/<appId>/app.config.json
 */
function getAppConfigPath(env: Env): string {
  const explicitPath = env.APP_CONFIG_PATH;
  if (explicitPath) {
    return path.isAbsolute(explicitPath) ? explicitPath : path.resolve(PROJECT_ROOT, explicitPath);
  }
  return path.join(PROJECT_ROOT, "clients", getTenantId(env), "apps", getAppId(env), "app.config.json");
}

/**
 * Load and parse app.config.json.
 * Returns null if the file does not exist.
 */
export function loadAppConfig(env: Env = process.env): AppConfig | null {
  const configPath = getAppConfigPath(env);
  if (!existsSync(configPath)) {
    return null;
  }
  const raw: unknown = JSON.parse(readFileSync(configPath, "utf-8"));
  return AppConfigFileSchema.parse(raw);
}

/**
 * Resolve flow path from flowId.
 * Path: clients/<tenantId>/flows/<flowId>/flow.yaml
 */
export function getFlowPath(tenantId: string, flowId: string): string {
  return path.join(PROJECT_ROOT, "clients", tenantId, "flows", flowId, "flow.yaml");
}

/**
 * Validate that the flow file exists.
 * Throws with clear error message if validation fails.
 */
export function validateAppConfig(config: ResolvedAppConfig): void {
  if (!existsSync(config.flowPath)) {
    throw new Error(`Flow not found: ${config.flowPath}. Ensure the flow file exists under clients/<tenant>/flows/.`);
  }
}

/**
 * Load app config and environment, resolve all paths.
 * Without an app config the default maternal-registration flow is used.
 */
export function resolveAppConfig(env: Env = process.env): ResolvedAppConfig {
  const tenantId = getTenantId(env);
  const appId = getAppId(env);
  const parsedEnv = EnvSchema.parse(env);
  const config = loadAppConfig(env);

  let flowId: string | null = config?.flowId ?? DEFAULT_FLOW_ID;
  let flowPath = getFlowPath(tenantId, flowId);
  if (config?.flow) {
    // Path-based override
    flowPath = path.isAbsolute(config.flow) ? config.flow : path.join(PROJECT_ROOT, config.flow);
    flowId = null;
  }

  const resolved: ResolvedAppConfig = {
    flowId,
    flowPath,
    tenantId,
    appId,
    port: parsedEnv.PORT,
    backendApiBaseUrl: parsedEnv.BACKEND_API_BASE_URL,
    telegram: {
      botToken: parsedEnv.TELEGRAM_BOT_TOKEN,
      webhookSecret: parsedEnv.TELEGRAM_WEBHOOK_SECRET,
      apiBaseUrl: parsedEnv.TELEGRAM_API_BASE_URL,
    },
    timeouts: {
      profileFetchMs: parsedEnv.PROFILE_FETCH_TIMEOUT_MS,
      storeMs: parsedEnv.STORE_TIMEOUT_MS,
      summaryMs: parsedEnv.SUMMARY_TIMEOUT_MS,
      registrationMs: parsedEnv.REGISTRATION_TIMEOUT_MS,
      analysisMs: parsedEnv.ANALYSIS_TIMEOUT_MS,
    },
  };

  validateAppConfig(resolved);
  return resolved;
}
