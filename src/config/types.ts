import type { LogLevel } from "../observability/types";

export type SinkType = "supabase" | "local_jsonl" | "http" | "sqs" | "rabbit";

export interface OutputDirs {
  manifests: string;
}

/** CSS selectors and URL markers of the portal's login and security-code forms. */
export interface PortalSelectors {
  username: string;
  password: string;
  securityCodeUrlPattern: string;
  challengeSubmit: string;
  codeInput: string;
}

export interface HttpSinkConfig {
  endpoint?: string;
  token?: string;
}

export interface AppConfig {
  loginUrl: string;
  targetUrl: string;
  username: string;
  password: string;
  totpUrl?: string;
  selectors: PortalSelectors;

  supabaseUrl?: string;
  supabaseServiceKey?: string;
  tableName: string;
  sinkType: SinkType;
  httpSink: HttpSinkConfig;
  sqsQueueUrl?: string;
  rabbitUrl?: string;

  startPage: number;
  endPage?: number;
  maxRetries: number;
  downloadTimeoutMs: number;
  navigationTimeoutMs: number;
  pageDelayMs: number;
  otpDispatchDelayMs: number;
  batchSize: number;
  maxContentChars?: number;

  headless: boolean;
  chromiumExecutablePath?: string;
  userAgent?: string;
  ignoreHttpsErrors: boolean;

  logLevel: LogLevel;
  storePath: string;
  outputDirs: OutputDirs;
}
