// Central table of backend providers

export { GitBackend, GitRefsBackend, gitProvider } from './git';

import { BackendProvider } from '../lib/backend';
import { gitProvider } from './git';

// Every provider whose backends the registry should know about
export function getBackendProviders(): BackendProvider[] {
  return [
    gitProvider,
  ];
}
