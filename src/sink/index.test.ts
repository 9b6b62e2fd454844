import fs from "node:fs";
import os from "node:os";
import path from "node:path";
import { afterEach, describe, expect, it } from "vitest";
import { loadConfig } from "../config";
import { ConfigError } from "../core/errors";
import { createSink, HttpSink, LocalJsonlSink, SupabaseSink } from "./index";

const BASE_ENV = {
  LOGIN_URL: "https://portal.example.org/user/login",
  TARGET_URL: "https://portal.example.org/judgments",
  LOGIN_USERNAME: "clerk@example.org",
  LOGIN_PASSWORD: "test-password",
};

const tempDirs: string[] = [];

afterEach(() => {
  for (const dir of tempDirs.splice(0)) {
    fs.rmSync(dir, { recursive: true, force: true });
  }
});

describe("createSink", () => {
  it("builds the Supabase sink by default", () => {
    const config = loadConfig(undefined, {
      ...BASE_ENV,
      SUPABASE_URL: "https://project.supabase.example",
      SUPABASE_SERVICE_KEY: "test-service-key",
    });
    expect(createSink(config, "run-1")).toBeInstanceOf(SupabaseSink);
  });

  it("builds the local JSONL sink under the manifests directory", () => {
    const dir = fs.mkdtempSync(path.join(os.tmpdir(), "harvester-sink-"));
    tempDirs.push(dir);
    const config = loadConfig(undefined, { ...BASE_ENV, SINK_TYPE: "local_jsonl", OUTPUT_MANIFESTS_DIR: dir });

    const sink = createSink(config, "run-1");

    expect(sink).toBeInstanceOf(LocalJsonlSink);
    expect(sink instanceof LocalJsonlSink && sink.location).toBe(path.join(dir, "judgments.jsonl"));
  });

  it("builds the HTTP sink and rejects it without an endpoint", () => {
    const configured = loadConfig(undefined, {
      ...BASE_ENV,
      SINK_TYPE: "http",
      HTTP_SINK_ENDPOINT: "https://collector.example.org/ingest",
    });
    expect(createSink(configured, "run-1")).toBeInstanceOf(HttpSink);

    const unconfigured = loadConfig(undefined, { ...BASE_ENV, SINK_TYPE: "http" });
    expect(() => createSink(unconfigured, "run-1")).toThrow(ConfigError);
  });
});
