/**
 * Pairs the static transport with an optional browser renderer
 */

import { PermanentFetchError } from "../errors";
import type { FetchCapability, RenderTransport, StaticTransport } from "../types/index";

/**
 * Without a renderer every dynamic fetch fails permanently, so no retries are spent on it.
 */
export function fetchCapability(
  http: StaticTransport,
  renderer?: RenderTransport,
): FetchCapability {
  return {
    fetchStatic: (url) => http.fetchStatic(url),
    fetchRendered: renderer
      ? (url) => renderer.fetchRendered(url)
      : async (url) => {
          throw new PermanentFetchError("Dynamic rendering disabled", url);
        },
  };
}
