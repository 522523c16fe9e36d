import { readFileSync, existsSync } from "node:fs";
import yaml from "js-yaml";
import { z } from "zod";

export class ConfigError extends Error {
  constructor(
    message: string,
    readonly remediation?: string
  ) {
    super(message);
    this.name = "ConfigError";
  }
}

const CategoryActionSchema = z.enum(["delete", "label", "skip"]);

const GmailOAuthConfigSchema = z.object({
  client_id: z.string().optional(),
  client_secret: z.string().optional(),
  redirect_port: z.number().int().positive().default(3000),
  scopes: z
    .array(z.string())
    .default(["https://www.googleapis.com/auth/gmail.modify"]),
});

const RetryConfigSchema = z.object({
  attempts: z.number().int().min(1).default(4),
  base_delay_ms: z.number().int().min(0).default(500),
  timeout_ms: z.number().int().positive().default(30_000),
});

const GmailConfigSchema = z.object({
  user: z.string().default("me"),
  oauth: GmailOAuthConfigSchema.default({}),
  token_path: z.string().default("./token.json"),
  query: z.string().default("in:inbox"),
  max_results: z.number().int().positive().default(500),
  fetch_concurrency: z.number().int().min(1).default(10),
  retry: RetryConfigSchema.default({}),
});

const CategoryRuleConfigSchema = z.object({
  label: z.string().min(1),
  keywords: z.array(z.string().min(1)).min(1),
});

const RulesConfigSchema = z.object({
  delete_older_than_days: z.number().int().min(1).default(90),
  priority_keywords: z.array(z.string()).default([]),
  priority_senders: z.array(z.string()).default([]),
  default_priority_keywords: z.array(z.string()).optional(),
  categories: z.array(CategoryRuleConfigSchema).optional(),
  protect_job_related: z.boolean().default(false),
  strict_duplicate_dates: z.boolean().default(false),
});

const AutomationConfigSchema = z.object({
  max_trash_per_run: z.number().int().min(0).default(100),
  schedule: z.enum(["daily", "weekly"]).default("daily"),
  cron: z.string().optional(),
  category_actions: z
    .object({
      default: CategoryActionSchema.default("label"),
      overrides: z.record(CategoryActionSchema).default({}),
    })
    .default({}),
});

const StateConfigSchema = z.object({
  reviewed_path: z.string().default("./reviewed.json"),
});

const UnsubscribeConfigSchema = z.object({
  timeout_ms: z.number().int().positive().default(10_000),
  mailto_delay_ms: z.number().int().min(0).default(2_000),
});

const AppConfigSchema = z.object({
  gmail: GmailConfigSchema.default({}),
  rules: RulesConfigSchema.default({}),
  automation: AutomationConfigSchema.default({}),
  state: StateConfigSchema.default({}),
  unsubscribe: UnsubscribeConfigSchema.default({}),
});

export type AppConfig = z.infer<typeof AppConfigSchema>;
export type RulesConfig = z.infer<typeof RulesConfigSchema>;
export type GmailConfig = z.infer<typeof GmailConfigSchema>;

/**
 * Load configuration from YAML file with environment variable overrides.
 * Env vars take precedence over YAML values for credentials and paths.
 * A missing file is not an error: every key has a default.
 */
export function loadConfig(configPath?: string): AppConfig {
  const path = configPath ?? process.env.CONFIG_PATH ?? "./config/config.yaml";

  let rawConfig: Record<string, unknown> = {};

  if (existsSync(path)) {
    const fileContent = readFileSync(path, "utf-8");
    let parsed: unknown;
    try {
      parsed = yaml.load(fileContent);
    } catch (err) {
      throw new ConfigError(
        `Could not parse ${path}: ${err instanceof Error ? err.message : String(err)}`,
        "Fix the YAML syntax or start again from config/config.example.yaml."
      );
    }
    if (isRecord(parsed)) {
      rawConfig = parsed;
    } else if (parsed !== undefined && parsed !== null) {
      throw new ConfigError(
        `${path} must contain a YAML mapping at the top level`,
        "Start again from config/config.example.yaml."
      );
    }
  }

  applyEnvOverrides(rawConfig);

  const result = AppConfigSchema.safeParse(rawConfig);
  if (!result.success) {
    const details = result.error.issues
      .map((issue) => `${issue.path.join(".")}: ${issue.message}`)
      .join("; ");
    throw new ConfigError(
      `Invalid configuration in ${path}: ${details}`,
      "Compare your file against config/config.example.yaml."
    );
  }
  return result.data;
}

/** Client credentials are only needed for sign-in, so they are checked lazily. */
export function requireOAuthCredentials(config: AppConfig): {
  clientId: string;
  clientSecret: string;
} {
  const { client_id: clientId, client_secret: clientSecret } = config.gmail.oauth;
  if (!clientId || !clientSecret) {
    throw new ConfigError(
      "Gmail OAuth client credentials are not configured",
      [
        "To set up Gmail access:",
        "  1. Go to https://console.cloud.google.com/apis/credentials",
        "  2. Create a project and enable the Gmail API",
        "  3. Create an OAuth 2.0 Client ID (Desktop app type)",
        "  4. Set GMAIL_OAUTH_CLIENT_ID and GMAIL_OAUTH_CLIENT_SECRET,",
        "     or gmail.oauth.client_id / client_secret in config.yaml",
      ].join("\n")
    );
  }
  return { clientId, clientSecret };
}

function applyEnvOverrides(config: Record<string, unknown>): void {
  const gmail = ensureObject(config, "gmail");
  const oauth = ensureObject(gmail, "oauth");
  const state = ensureObject(config, "state");

  if (process.env.GMAIL_OAUTH_CLIENT_ID) oauth.client_id = process.env.GMAIL_OAUTH_CLIENT_ID;
  if (process.env.GMAIL_OAUTH_CLIENT_SECRET) {
    oauth.client_secret = process.env.GMAIL_OAUTH_CLIENT_SECRET;
  }
  if (process.env.GMAIL_OAUTH_REDIRECT_PORT) {
    oauth.redirect_port = parseInt(process.env.GMAIL_OAUTH_REDIRECT_PORT, 10);
  }
  if (process.env.GMAIL_USER) gmail.user = process.env.GMAIL_USER;
  if (process.env.GMAIL_TOKEN_PATH) gmail.token_path = process.env.GMAIL_TOKEN_PATH;
  if (process.env.TRIAGE_REVIEWED_PATH) state.reviewed_path = process.env.TRIAGE_REVIEWED_PATH;
}

function ensureObject(
  parent: Record<string, unknown>,
  key: string
): Record<string, unknown> {
  const existing = parent[key];
  if (isRecord(existing)) return existing;
  const created: Record<string, unknown> = {};
  parent[key] = created;
  return created;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}
