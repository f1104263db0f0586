/**
 * Fetch entrypoint: exports the default transport and its contract.
 * @module
 */
export { FetchClient } from './client.js';
export { mergeHeaderOptions } from './utils.js';
export type { FetchClientOptions, FetchClientProvider, FetchClientProviderDefinition, FetchOptions } from '../types/request.js';
