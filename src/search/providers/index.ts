/**
 * Retrieval provider adapters and the config-driven factory.
 */

import type { EnvVars } from '../../config/env.js';
import type { SearchProviderName } from '../../config/schema.js';
import type { SearchProvider } from '../types.js';
import { BraveProvider } from './brave.js';
import { DuckDuckGoProvider } from './duckduckgo.js';
import { TavilyProvider } from './tavily.js';

export { BraveProvider, DuckDuckGoProvider, TavilyProvider };
export { fetchJson } from './http.js';

/**
 * Build adapters for the configured priority list. Order is preserved;
 * adapters without credentials are still returned and report
 * `isAvailable = false`.
 */
export function createSearchProviders(
  names: SearchProviderName[],
  env: EnvVars
): SearchProvider[] {
  return names.map((name) => {
    switch (name) {
      case 'tavily':
        return new TavilyProvider(env.TAVILY_API_KEY);
      case 'brave':
        return new BraveProvider(env.BRAVE_API_KEY);
      case 'duckduckgo':
        return new DuckDuckGoProvider();
    }
  });
}
