/**
 * @packageDocumentation
 * @module @backstub/adapter-node-fetch
 *
 * Backstub Node-Fetch Adapter Package
 *
 * A drop-in replacement for node-fetch's `fetch` that answers requests from
 * a backstub backend.
 */

export {
  default,
  default as createStubFetch,
  toHttpRequest,
} from "./node-fetch-stub";
export type { StubFetch } from "./node-fetch-stub";
