// Logging settings

import { registerSettings } from '../lib/settings-registry';

export function registerLoggingSettings(): void {
  registerSettings([
    {
      key: 'logging.suppressedLoggers',
      description: 'Loggers held at warn level outside debug mode',
      type: 'array',
      defaultValue: ['http', 'https', 'undici'],
      category: 'logging',
      validate: (value) => Array.isArray(value) && value.every(name => name.trim().length > 0)
    }
  ]);
}
