export type LoadState = "load" | "domcontentloaded" | "networkidle";

export interface TimeoutOptions {
  timeout?: number;
}

/**
 * The slice of a browser tab the harvester drives. Playwright's `Page` satisfies it.
 */
export interface PageLike {
  goto(url: string, options?: { waitUntil?: LoadState; timeout?: number }): Promise<unknown>;
  waitForLoadState(state?: LoadState, options?: TimeoutOptions): Promise<void>;
  fill(selector: string, value: string, options?: TimeoutOptions): Promise<void>;
  press(selector: string, key: string, options?: TimeoutOptions): Promise<void>;
  click(selector: string, options?: TimeoutOptions): Promise<void>;
  content(): Promise<string>;
  url(): string;
}

export interface ResponseLike {
  ok(): boolean;
  status(): number;
  headers(): Record<string, string>;
  body(): Promise<Buffer>;
}

/** Cookie-sharing HTTP channel of the browser context (Playwright's `APIRequestContext`). */
export interface RequestLike {
  get(url: string, options?: TimeoutOptions): Promise<ResponseLike>;
}

export interface BrowserSession {
  page: PageLike;
  request: RequestLike;
}
