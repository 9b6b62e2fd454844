import { describe, expect, it, vi } from "vitest";
import type { BrowserLauncher } from "../browser";
import { InMemoryStore } from "../store/memoryStore";
import type { RecordSink } from "../sink";
import { FakePage, FakeRequest } from "../testing/fakeBrowser";
import { parseCliArgs, runCli } from "./index";

const ENV = {
  LOGIN_URL: "https://portal.example.org/user/login",
  TARGET_URL: "https://portal.example.org/judgments",
  LOGIN_USERNAME: "clerk@example.org",
  LOGIN_PASSWORD: "test-password",
  SINK_TYPE: "local_jsonl",
  END_PAGE: "1",
  MAX_RETRIES: "1",
};

function launcherFor(page: FakePage): BrowserLauncher {
  return async () => ({ session: { page, request: new FakeRequest() }, close: async () => undefined });
}

const noopSink: RecordSink = { insert: async () => undefined };

function silenceConsole(): void {
  vi.spyOn(console, "log").mockImplementation(() => undefined);
  vi.spyOn(console, "error").mockImplementation(() => undefined);
}

describe("parseCliArgs", () => {
  it("accepts no arguments or a config path", () => {
    expect(parseCliArgs([])).toEqual({});
    expect(parseCliArgs(["--config", "harvester.json"])).toEqual({ configPath: "harvester.json" });
  });

  it("falls back to help for help flags and malformed input", () => {
    expect(parseCliArgs(["--help"])).toBe("help");
    expect(parseCliArgs(["-h"])).toBe("help");
    expect(parseCliArgs(["--config"])).toBe("help");
    expect(parseCliArgs(["--config", "--help"])).toBe("help");
    expect(parseCliArgs(["crawl"])).toBe("help");
  });
});

describe("runCli", () => {
  it("prints help and succeeds", async () => {
    silenceConsole();
    await expect(runCli(["--help"])).resolves.toBe(0);
    expect(console.log).toHaveBeenCalledTimes(1);
  });

  it("exits non-zero before launching a browser when settings are missing", async () => {
    silenceConsole();
    const launcher = vi.fn<BrowserLauncher>();

    await expect(runCli([], { env: {}, launcher })).resolves.toBe(1);
    expect(launcher).not.toHaveBeenCalled();
  });

  it("runs a harvest and marks the run completed", async () => {
    silenceConsole();
    const store = new InMemoryStore();
    const startRun = vi.spyOn(store, "startRun");
    const page = new FakePage();

    const code = await runCli([], {
      env: ENV,
      launcher: launcherFor(page),
      createStore: () => store,
      createSink: () => noopSink,
    });

    expect(code).toBe(0);
    expect(page.callsOf("goto").map((call) => call.args[0])).toEqual([
      "https://portal.example.org/user/login",
      "https://portal.example.org/judgments?page=0",
    ]);
    const runId = startRun.mock.calls[0][0];
    await expect(store.getRunStats(runId)).resolves.toMatchObject({ status: "completed", ingested: 0, failed: 0 });
  });

  it("exits non-zero and marks the run failed when login fails", async () => {
    silenceConsole();
    const store = new InMemoryStore();
    const startRun = vi.spyOn(store, "startRun");
    const page = new FakePage();
    page.gotoFailures = 5;

    const code = await runCli([], {
      env: ENV,
      launcher: launcherFor(page),
      createStore: () => store,
      createSink: () => noopSink,
    });

    expect(code).toBe(1);
    expect(page.callsOf("goto")).toHaveLength(1);
    await expect(store.getRunStats(startRun.mock.calls[0][0])).resolves.toMatchObject({ status: "failed" });
  });
});
