/**
 * Signature of the fetch implementation outbound calls go through (injected in tests)
 */
export type FetchFn = typeof fetch;
