import fs from "node:fs";
import path from "node:path";
import { ConfigError } from "../core/errors";
import type { LogLevel } from "../observability/types";
import { AppConfig, PortalSelectors, SinkType } from "./types";

type Env = Record<string, string | undefined>;
type FileSection = Record<string, unknown>;

const SINK_TYPES: readonly SinkType[] = ["supabase", "local_jsonl", "http", "sqs", "rabbit"];

const DEFAULT_SELECTORS: PortalSelectors = {
  username: "#userEmail-id",
  password: "#plainTextPassword",
  securityCodeUrlPattern: "security[-_]?code",
  challengeSubmit: "form button[type='submit'], form input[type='submit']",
  codeInput: "input[name='code'], input[name='otp'], #edit-code",
};

const DEFAULTS = {
  tableName: "judgments",
  sinkType: "supabase",
  startPage: 1,
  maxRetries: 5,
  downloadTimeoutMs: 60_000,
  navigationTimeoutMs: 30_000,
  pageDelayMs: 20_000,
  otpDispatchDelayMs: 3_000,
  batchSize: 10,
  headless: true,
  ignoreHttpsErrors: false,
  logLevel: "info",
  storePath: "data/state.sqlite",
  manifestsDir: "data/manifests",
} as const;

function isSection(value: unknown): value is FileSection {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function readConfigFile(configPath?: string): FileSection {
  if (!configPath) {
    return {};
  }

  const absolutePath = path.resolve(configPath);
  if (!fs.existsSync(absolutePath)) {
    throw new ConfigError(`Config file not found: ${absolutePath}`);
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(fs.readFileSync(absolutePath, "utf-8"));
  } catch (error) {
    throw new ConfigError(`Config file is not valid JSON: ${absolutePath}`, { cause: error });
  }
  if (!isSection(parsed)) {
    throw new ConfigError(`Config file must contain a JSON object: ${absolutePath}`);
  }
  return parsed;
}

function nonEmpty(value: string | undefined): string | undefined {
  const trimmed = value?.trim();
  return trimmed ? trimmed : undefined;
}

function fromFile(section: FileSection, key: string): string | undefined {
  const value = section[key];
  if (typeof value === "string") {
    return nonEmpty(value);
  }
  if (typeof value === "number" || typeof value === "boolean") {
    return String(value);
  }
  return undefined;
}

function toInt(name: string, value: string | undefined, min: number): number | undefined {
  if (value === undefined) {
    return undefined;
  }
  if (!/^-?\d+$/.test(value)) {
    throw new ConfigError(`${name} must be an integer, got "${value}"`);
  }
  const parsed = Number.parseInt(value, 10);
  if (parsed < min) {
    throw new ConfigError(`${name} must be >= ${min}, got ${parsed}`);
  }
  return parsed;
}

function toBool(value: string | undefined, fallback: boolean): boolean {
  if (!value) {
    return fallback;
  }
  const normalized = value.trim().toLowerCase();
  if (normalized === "1" || normalized === "true" || normalized === "yes" || normalized === "y") {
    return true;
  }
  if (normalized === "0" || normalized === "false" || normalized === "no" || normalized === "n") {
    return false;
  }
  return fallback;
}

function toLogLevel(value: string | undefined): LogLevel {
  switch (value?.toLowerCase()) {
    case "debug":
      return "debug";
    case "warn":
    case "warning":
      return "warn";
    case "error":
      return "error";
    default:
      return DEFAULTS.logLevel;
  }
}

function toSinkType(value: string | undefined): SinkType {
  if (value === undefined) {
    return DEFAULTS.sinkType;
  }
  const normalized = value.toLowerCase();
  const match = SINK_TYPES.find((type) => type === normalized);
  if (!match) {
    throw new ConfigError(`SINK_TYPE must be one of ${SINK_TYPES.join(", ")}, got "${value}"`);
  }
  return match;
}

function requireUrl(name: string, value: string | undefined, missing: string[]): string {
  if (value === undefined) {
    missing.push(name);
    return "";
  }
  try {
    new URL(value);
  } catch {
    throw new ConfigError(`${name} is not a valid URL: "${value}"`);
  }
  return value;
}

function requireValue(name: string, value: string | undefined, missing: string[]): string {
  if (value === undefined) {
    missing.push(name);
    return "";
  }
  return value;
}

/**
 * Builds the run configuration from defaults, an optional JSON file and the environment
 * (environment wins). Throws {@link ConfigError} when required settings are absent.
 */
export function loadConfig(configPath?: string, env: Env = process.env): AppConfig {
  const file = readConfigFile(configPath);
  const fileSelectors = isSection(file.selectors) ? file.selectors : {};
  const fileOutputDirs = isSection(file.outputDirs) ? file.outputDirs : {};
  const fileHttpSink = isSection(file.httpSink) ? file.httpSink : {};
  const pick = (envName: string, fileKey: string): string | undefined => nonEmpty(env[envName]) ?? fromFile(file, fileKey);

  const missing: string[] = [];
  const loginUrl = requireUrl("LOGIN_URL", pick("LOGIN_URL", "loginUrl"), missing);
  const targetUrl = requireUrl("TARGET_URL", pick("TARGET_URL", "targetUrl"), missing);
  const username = requireValue("LOGIN_USERNAME", pick("LOGIN_USERNAME", "username"), missing);
  const password = requireValue("LOGIN_PASSWORD", pick("LOGIN_PASSWORD", "password"), missing);

  const sinkType = toSinkType(pick("SINK_TYPE", "sinkType"));
  const supabaseUrl = pick("SUPABASE_URL", "supabaseUrl");
  const supabaseServiceKey =
    nonEmpty(env.SUPABASE_SERVICE_KEY) ?? nonEmpty(env.SUPABASE_ANON_KEY) ?? fromFile(file, "supabaseServiceKey");
  if (sinkType === "supabase") {
    requireValue("SUPABASE_URL", supabaseUrl, missing);
    requireValue("SUPABASE_SERVICE_KEY", supabaseServiceKey, missing);
  }

  if (missing.length > 0) {
    throw new ConfigError(`Missing required settings: ${missing.join(", ")}`);
  }

  const selectors: PortalSelectors = {
    username: fromFile(fileSelectors, "username") ?? DEFAULT_SELECTORS.username,
    password: fromFile(fileSelectors, "password") ?? DEFAULT_SELECTORS.password,
    securityCodeUrlPattern: fromFile(fileSelectors, "securityCodeUrlPattern") ?? DEFAULT_SELECTORS.securityCodeUrlPattern,
    challengeSubmit: fromFile(fileSelectors, "challengeSubmit") ?? DEFAULT_SELECTORS.challengeSubmit,
    codeInput: fromFile(fileSelectors, "codeInput") ?? DEFAULT_SELECTORS.codeInput,
  };

  return {
    loginUrl,
    targetUrl,
    username,
    password,
    totpUrl: pick("TOTP_URL", "totpUrl"),
    selectors,
    supabaseUrl,
    supabaseServiceKey,
    tableName: pick("TABLE_NAME", "tableName") ?? DEFAULTS.tableName,
    sinkType,
    httpSink: {
      endpoint: nonEmpty(env.HTTP_SINK_ENDPOINT) ?? fromFile(fileHttpSink, "endpoint"),
      token: nonEmpty(env.HTTP_SINK_TOKEN) ?? fromFile(fileHttpSink, "token"),
    },
    sqsQueueUrl: pick("SQS_QUEUE_URL", "sqsQueueUrl"),
    rabbitUrl: pick("RABBIT_URL", "rabbitUrl"),
    startPage: toInt("START_PAGE", pick("START_PAGE", "startPage"), 1) ?? DEFAULTS.startPage,
    endPage: toInt("END_PAGE", pick("END_PAGE", "endPage"), 1),
    maxRetries: toInt("MAX_RETRIES", pick("MAX_RETRIES", "maxRetries"), 1) ?? DEFAULTS.maxRetries,
    downloadTimeoutMs: toInt("DOWNLOAD_TIMEOUT", pick("DOWNLOAD_TIMEOUT", "downloadTimeoutMs"), 1) ?? DEFAULTS.downloadTimeoutMs,
    navigationTimeoutMs:
      toInt("NAVIGATION_TIMEOUT", pick("NAVIGATION_TIMEOUT", "navigationTimeoutMs"), 1) ?? DEFAULTS.navigationTimeoutMs,
    pageDelayMs: toInt("PAGE_DELAY", pick("PAGE_DELAY", "pageDelayMs"), 0) ?? DEFAULTS.pageDelayMs,
    otpDispatchDelayMs:
      toInt("OTP_DISPATCH_DELAY", pick("OTP_DISPATCH_DELAY", "otpDispatchDelayMs"), 0) ?? DEFAULTS.otpDispatchDelayMs,
    batchSize: toInt("BATCH_SIZE", pick("BATCH_SIZE", "batchSize"), 1) ?? DEFAULTS.batchSize,
    maxContentChars: toInt("MAX_CONTENT_CHARS", pick("MAX_CONTENT_CHARS", "maxContentChars"), 1),
    headless: toBool(pick("HEADLESS", "headless"), DEFAULTS.headless),
    chromiumExecutablePath: pick("CHROMIUM_EXECUTABLE_PATH", "chromiumExecutablePath"),
    userAgent: pick("USER_AGENT", "userAgent"),
    ignoreHttpsErrors: toBool(pick("IGNORE_HTTPS_ERRORS", "ignoreHttpsErrors"), DEFAULTS.ignoreHttpsErrors),
    logLevel: toLogLevel(pick("LOG_LEVEL", "logLevel")),
    storePath: pick("STORE_PATH", "storePath") ?? DEFAULTS.storePath,
    outputDirs: {
      manifests: nonEmpty(env.OUTPUT_MANIFESTS_DIR) ?? fromFile(fileOutputDirs, "manifests") ?? DEFAULTS.manifestsDir,
    },
  };
}

export { DEFAULT_SELECTORS };
