// Terminal output settings

import { registerSettings } from '../lib/settings-registry';

export function registerOutputSettings(): void {
  registerSettings([
    {
      key: 'output.color',
      description: 'Color log lines when the terminal supports it',
      type: 'boolean',
      defaultValue: true,
      category: 'output'
    }
  ]);
}
