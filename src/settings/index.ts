// Central settings registration - import and register all settings

import { registerLoggingSettings } from './logging';
import { registerOutputSettings } from './output';
import { settingsRegistry } from '../lib/settings-registry';

let initialized = false;

// Initialize all settings - call this once at app startup
export function initializeSettings(): void {
  if (initialized) {
    return;
  }

  registerLoggingSettings();
  registerOutputSettings();

  initialized = true;
}

export { settingsRegistry };
export * from '../lib/settings-registry';
