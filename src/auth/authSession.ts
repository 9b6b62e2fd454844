import { AppConfig } from "../config";
import { AuthError, TotpError } from "../core/errors";
import { FetchLike } from "../core/fetch";
import { exponentialBackoff, withRetry } from "../core/retry";
import { sleep as defaultSleep, SleepFn } from "../core/sleep";
import type { PageLike } from "../browser";
import { Logger } from "../observability";
import { fetchOneTimeCode } from "./oneTimeCode";

export type AuthConfig = Pick<
  AppConfig,
  "loginUrl" | "username" | "password" | "totpUrl" | "selectors" | "maxRetries" | "navigationTimeoutMs" | "otpDispatchDelayMs"
>;

interface AuthSessionDeps {
  page: PageLike;
  config: AuthConfig;
  logger: Logger;
  fetchFn: FetchLike;
  sleep?: SleepFn;
}

/**
 * Logs into the portal's form, then completes the security-code step when the portal
 * asks for one. A failed security-code step is logged and does not fail the login.
 */
export class AuthSession {
  private readonly page: PageLike;
  private readonly config: AuthConfig;
  private readonly logger: Logger;
  private readonly fetchFn: FetchLike;
  private readonly sleep: SleepFn;
  private readonly securityCodeUrl: RegExp;

  constructor(deps: AuthSessionDeps) {
    this.page = deps.page;
    this.config = deps.config;
    this.logger = deps.logger;
    this.fetchFn = deps.fetchFn;
    this.sleep = deps.sleep ?? defaultSleep;
    this.securityCodeUrl = new RegExp(deps.config.selectors.securityCodeUrlPattern, "i");
  }

  async login(): Promise<void> {
    try {
      await withRetry((attempt) => this.attemptLogin(attempt), {
        maxAttempts: this.config.maxRetries,
        backoff: exponentialBackoff(1_000, 10_000),
        sleep: this.sleep,
        onRetry: (attempt, error, delayMs) =>
          this.logger.warn("login_attempt_failed", {
            attempt,
            delayMs,
            error: error instanceof Error ? error.message : String(error),
          }),
      });
    } catch (error) {
      throw new AuthError(`Login to ${this.config.loginUrl} failed`, { cause: error });
    }
  }

  private async attemptLogin(attempt: number): Promise<void> {
    const { selectors, navigationTimeoutMs: timeout } = this.config;
    this.logger.info("login_start", { url: this.config.loginUrl, attempt });

    await this.page.goto(this.config.loginUrl, { waitUntil: "domcontentloaded", timeout });
    await this.page.fill(selectors.username, this.config.username, { timeout });
    await this.page.fill(selectors.password, this.config.password, { timeout });
    // The portal's form handler listens for Enter in the password field, not a button click.
    await this.page.press(selectors.password, "Enter", { timeout });
    await this.page.waitForLoadState("networkidle", { timeout });

    if (this.securityCodeUrl.test(this.page.url())) {
      await this.completeSecurityCodeStep();
    }

    this.logger.info("login_complete", { attempt });
  }

  private async completeSecurityCodeStep(): Promise<void> {
    const { selectors, navigationTimeoutMs: timeout } = this.config;
    this.logger.info("security_code_requested", { url: this.page.url() });

    try {
      await this.page.click(selectors.challengeSubmit, { timeout });
      await this.sleep(this.config.otpDispatchDelayMs);

      if (!this.config.totpUrl) {
        throw new TotpError("Portal asked for a security code but no TOTP_URL is configured");
      }

      const code = await fetchOneTimeCode(this.config.totpUrl, this.fetchFn);
      this.logger.info("security_code_received", { codeLength: code.length });

      await this.page.fill(selectors.codeInput, code, { timeout });
      await this.page.press(selectors.codeInput, "Enter", { timeout });
      await this.page.waitForLoadState("networkidle", { timeout });
      this.logger.info("security_code_submitted");
    } catch (error) {
      const totpError =
        error instanceof TotpError
          ? error
          : new TotpError(`Security-code step failed: ${error instanceof Error ? error.message : String(error)}`, {
              cause: error,
            });
      this.logger.warn("security_code_step_failed", { error: totpError.message });
    }
  }
}
