import type { AbsoluteUrl } from "./AbsoluteUrl.js";

/** Gateway-level settings. */
export interface Server {
  /** Overrides the base URL that Http step paths are resolved against. */
  readonly baseURL?: AbsoluteUrl;
}

export function emptyServer(): Server {
  return {};
}

export function isServerEmpty(server: Server): boolean {
  return server.baseURL === undefined;
}
