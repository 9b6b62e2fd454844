import { Agent, fetch as undiciFetch } from "undici";

let insecureAgent: Agent | undefined;

function getInsecureAgent(): Agent {
  if (!insecureAgent) {
    insecureAgent = new Agent({
      connect: {
        rejectUnauthorized: false,
      },
    });
  }
  return insecureAgent;
}

export function getFetchDispatcher(ignoreHttpsErrors: boolean): Agent | undefined {
  if (!ignoreHttpsErrors) {
    return undefined;
  }
  return getInsecureAgent();
}

export interface HttpResponseLike {
  ok: boolean;
  status: number;
  text(): Promise<string>;
}

export interface FetchInit {
  method: string;
  headers: Record<string, string>;
  body?: string;
  signal: AbortSignal;
}

export type FetchLike = (url: string, init: FetchInit) => Promise<HttpResponseLike>;

export function createFetch(ignoreHttpsErrors: boolean): FetchLike {
  const dispatcher = getFetchDispatcher(ignoreHttpsErrors);
  return (url, init) => undiciFetch(url, { ...init, dispatcher });
}
