/**
 * @packageDocumentation
 * @module @backstub/adapter-axios
 *
 * Backstub Axios Adapter Package
 *
 * An axios adapter that answers requests from a backstub backend, so code
 * written against an axios instance can run against stubbed responses.
 */

export { default, default as createAxiosStubAdapter, toHttpRequest } from "./axios-stub-adapter";
