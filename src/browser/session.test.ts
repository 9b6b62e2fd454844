import { describe, expect, it, vi } from "vitest";
import { Logger } from "../observability";
import { FakePage, FakeRequest } from "../testing/fakeBrowser";
import { BrowserLauncher, withBrowserSession } from "./session";

const OPTIONS = { headless: true, ignoreHttpsErrors: false };

function fakeLauncher(close: () => Promise<void>): { launcher: BrowserLauncher; page: FakePage } {
  const page = new FakePage();
  return {
    page,
    launcher: async () => ({ session: { page, request: new FakeRequest() }, close }),
  };
}

function captureLogger(): { logger: Logger; messages: string[] } {
  const messages: string[] = [];
  const logger = new Logger({ component: "browser", runId: "run-1" }, (_level, line) => {
    const entry: { msg: string } = JSON.parse(line);
    messages.push(entry.msg);
  });
  return { logger, messages };
}

describe("withBrowserSession", () => {
  it("hands the session to the work and closes afterwards", async () => {
    const close = vi.fn(async () => undefined);
    const { launcher, page } = fakeLauncher(close);
    const { logger, messages } = captureLogger();

    const result = await withBrowserSession(OPTIONS, logger, async (session) => session.page === page, launcher);

    expect(result).toBe(true);
    expect(close).toHaveBeenCalledTimes(1);
    expect(messages).toEqual(["browser_started", "browser_closed"]);
  });

  it("closes the browser when the work throws", async () => {
    const close = vi.fn(async () => undefined);
    const { launcher } = fakeLauncher(close);
    const { logger } = captureLogger();

    await expect(
      withBrowserSession(
        OPTIONS,
        logger,
        async () => {
          throw new Error("listing page crashed");
        },
        launcher,
      ),
    ).rejects.toThrow("listing page crashed");
    expect(close).toHaveBeenCalledTimes(1);
  });

  it("keeps the work's result when closing fails", async () => {
    const { launcher } = fakeLauncher(async () => {
      throw new Error("Target closed");
    });
    const { logger, messages } = captureLogger();

    await expect(withBrowserSession(OPTIONS, logger, async () => "done", launcher)).resolves.toBe("done");
    expect(messages).toEqual(["browser_started", "browser_close_failed"]);
  });
});
