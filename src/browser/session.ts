import { chromium } from "playwright-core";
import { Logger } from "../observability";
import { BrowserSession } from "./types";

export interface BrowserLaunchOptions {
  headless: boolean;
  executablePath?: string;
  userAgent?: string;
  ignoreHttpsErrors: boolean;
}

export interface LaunchedBrowser {
  session: BrowserSession;
  close(): Promise<void>;
}

export type BrowserLauncher = (options: BrowserLaunchOptions) => Promise<LaunchedBrowser>;

export const launchChromium: BrowserLauncher = async (options) => {
  const browser = await chromium.launch({
    headless: options.headless,
    executablePath: options.executablePath,
    args: ["--no-sandbox", "--disable-dev-shm-usage"],
  });

  try {
    const context = await browser.newContext({
      acceptDownloads: true,
      ignoreHTTPSErrors: options.ignoreHttpsErrors,
      userAgent: options.userAgent,
    });
    const page = await context.newPage();

    return {
      session: { page, request: context.request },
      close: async () => {
        await context.close();
        await browser.close();
      },
    };
  } catch (error) {
    await browser.close();
    throw error;
  }
};

/**
 * Runs `work` with a fresh browser session and closes the browser on every exit path.
 */
export async function withBrowserSession<T>(
  options: BrowserLaunchOptions,
  logger: Logger,
  work: (session: BrowserSession) => Promise<T>,
  launcher: BrowserLauncher = launchChromium,
): Promise<T> {
  const launched = await launcher(options);
  logger.info("browser_started", { headless: options.headless });

  try {
    return await work(launched.session);
  } finally {
    try {
      await launched.close();
      logger.info("browser_closed");
    } catch (error) {
      logger.warn("browser_close_failed", { error: error instanceof Error ? error.message : String(error) });
    }
  }
}
