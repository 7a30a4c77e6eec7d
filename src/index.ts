#!/usr/bin/env node

// sourcefetch entry point

import { runWithBoundary } from './lib/boundary';
import { loadConfig } from './lib/config';
import { getBackendProviders } from './backends';

runWithBoundary(process.argv.slice(2), {
  providers: getBackendProviders,
  loadConfig: () => loadConfig()
})
  .then((code) => {
    process.exit(code);
  })
  .catch((error: unknown) => {
    console.error('Launcher failed:', error);
    process.exit(1);
  });
