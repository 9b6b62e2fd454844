import fs from "node:fs";
import os from "node:os";
import path from "node:path";
import { afterEach, describe, expect, it } from "vitest";
import { ConfigError } from "../core/errors";
import { DEFAULT_SELECTORS, loadConfig } from "./loadConfig";

const REQUIRED_ENV = {
  LOGIN_URL: "https://portal.example.org/user/login",
  TARGET_URL: "https://portal.example.org/judgments",
  LOGIN_USERNAME: "clerk@example.org",
  LOGIN_PASSWORD: "test-password",
  SUPABASE_URL: "https://project.supabase.example",
  SUPABASE_SERVICE_KEY: "test-service-key",
};

const tempDirs: string[] = [];

function writeConfigFile(contents: string): string {
  const dir = fs.mkdtempSync(path.join(os.tmpdir(), "harvester-config-"));
  tempDirs.push(dir);
  const file = path.join(dir, "config.json");
  fs.writeFileSync(file, contents, "utf-8");
  return file;
}

afterEach(() => {
  for (const dir of tempDirs.splice(0)) {
    fs.rmSync(dir, { recursive: true, force: true });
  }
});

describe("loadConfig", () => {
  it("applies defaults when only required settings are present", () => {
    const config = loadConfig(undefined, REQUIRED_ENV);

    expect(config).toMatchObject({
      loginUrl: "https://portal.example.org/user/login",
      targetUrl: "https://portal.example.org/judgments",
      tableName: "judgments",
      sinkType: "supabase",
      startPage: 1,
      endPage: undefined,
      maxRetries: 5,
      downloadTimeoutMs: 60_000,
      pageDelayMs: 20_000,
      batchSize: 10,
      headless: true,
      logLevel: "info",
      totpUrl: undefined,
      maxContentChars: undefined,
    });
    expect(config.selectors).toEqual(DEFAULT_SELECTORS);
  });

  it("reads the optional settings from the environment", () => {
    const config = loadConfig(undefined, {
      ...REQUIRED_ENV,
      START_PAGE: "3",
      END_PAGE: "7",
      BATCH_SIZE: "4",
      PAGE_DELAY: "0",
      HEADLESS: "false",
      LOG_LEVEL: "WARNING",
      TOTP_URL: "https://otp.example.org/latest",
      TABLE_NAME: "judgments7",
    });

    expect(config).toMatchObject({
      startPage: 3,
      endPage: 7,
      batchSize: 4,
      pageDelayMs: 0,
      headless: false,
      logLevel: "warn",
      totpUrl: "https://otp.example.org/latest",
      tableName: "judgments7",
    });
  });

  it("treats an empty END_PAGE as unbounded", () => {
    expect(loadConfig(undefined, { ...REQUIRED_ENV, END_PAGE: "  " }).endPage).toBeUndefined();
  });

  it("falls back to the anon key when no service key is set", () => {
    const { SUPABASE_SERVICE_KEY: _unused, ...env } = REQUIRED_ENV;
    expect(loadConfig(undefined, { ...env, SUPABASE_ANON_KEY: "test-anon-key" }).supabaseServiceKey).toBe("test-anon-key");
  });

  it("names every missing required setting", () => {
    expect(() => loadConfig(undefined, { LOGIN_URL: "https://portal.example.org/login" })).toThrow(
      new ConfigError(
        "Missing required settings: TARGET_URL, LOGIN_USERNAME, LOGIN_PASSWORD, SUPABASE_URL, SUPABASE_SERVICE_KEY",
      ),
    );
  });

  it("does not require Supabase settings for other sinks", () => {
    const { SUPABASE_URL: _url, SUPABASE_SERVICE_KEY: _key, ...env } = REQUIRED_ENV;
    expect(loadConfig(undefined, { ...env, SINK_TYPE: "local_jsonl" }).sinkType).toBe("local_jsonl");
  });

  it("rejects malformed numbers and unknown sinks", () => {
    expect(() => loadConfig(undefined, { ...REQUIRED_ENV, BATCH_SIZE: "ten" })).toThrow(ConfigError);
    expect(() => loadConfig(undefined, { ...REQUIRED_ENV, START_PAGE: "0" })).toThrow("START_PAGE must be >= 1, got 0");
    expect(() => loadConfig(undefined, { ...REQUIRED_ENV, SINK_TYPE: "kafka" })).toThrow(ConfigError);
    expect(() => loadConfig(undefined, { ...REQUIRED_ENV, LOGIN_URL: "portal/login" })).toThrow(
      'LOGIN_URL is not a valid URL: "portal/login"',
    );
  });

  it("layers the environment over a JSON config file", () => {
    const file = writeConfigFile(
      JSON.stringify({
        batchSize: 3,
        endPage: 2,
        tableName: "from_file",
        selectors: { username: "#name", codeInput: "#otp" },
      }),
    );

    const config = loadConfig(file, { ...REQUIRED_ENV, TABLE_NAME: "from_env" });

    expect(config.batchSize).toBe(3);
    expect(config.endPage).toBe(2);
    expect(config.tableName).toBe("from_env");
    expect(config.selectors).toEqual({ ...DEFAULT_SELECTORS, username: "#name", codeInput: "#otp" });
  });

  it("reports a missing or invalid config file", () => {
    expect(() => loadConfig("/nonexistent/harvester.json", REQUIRED_ENV)).toThrow(ConfigError);
    expect(() => loadConfig(writeConfigFile("[1, 2]"), REQUIRED_ENV)).toThrow(ConfigError);
  });
});
