// Settings registry - lets each feature area declare the settings it reads

export type SettingType = 'boolean' | 'number' | 'string' | 'enum' | 'array';

export type SettingValue = boolean | number | string | string[];

export interface ConfigTree {
  [key: string]: unknown;
}

export interface SettingDefinition {
  key: string;
  description: string;
  type: SettingType;
  defaultValue: SettingValue;
  category?: string;
  options?: string[]; // For enum types
  validate?: (value: SettingValue) => boolean;
}

export function isConfigTree(value: unknown): value is ConfigTree {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function matchesType(setting: SettingDefinition, value: unknown): value is SettingValue {
  switch (setting.type) {
    case 'boolean':
      return typeof value === 'boolean';
    case 'number':
      return typeof value === 'number' && Number.isFinite(value);
    case 'string':
      return typeof value === 'string';
    case 'enum':
      return typeof value === 'string' && (setting.options ?? []).includes(value);
    case 'array':
      return Array.isArray(value) && value.every(item => typeof item === 'string');
  }
}

export class SettingsRegistry {
  private settings: Map<string, SettingDefinition> = new Map();

  register(setting: SettingDefinition): void {
    if (this.settings.has(setting.key)) {
      console.warn(`Setting ${setting.key} is already registered`);
      return;
    }
    this.settings.set(setting.key, setting);
  }

  registerMultiple(settings: SettingDefinition[]): void {
    settings.forEach(setting => this.register(setting));
  }

  get(key: string): SettingDefinition | undefined {
    return this.settings.get(key);
  }

  getAll(): SettingDefinition[] {
    return Array.from(this.settings.values());
  }

  has(key: string): boolean {
    return this.settings.has(key);
  }

  /**
   * Checks a raw value against a setting's type and validator.
   * Returns a problem description, or undefined when the value is acceptable.
   */
  check(key: string, value: unknown): string | undefined {
    const setting = this.settings.get(key);
    if (!setting) {
      return `unknown setting ${key}`;
    }
    if (!matchesType(setting, value)) {
      const expected = setting.type === 'enum'
        ? `one of ${(setting.options ?? []).join(', ')}`
        : setting.type;
      return `${key} must be ${expected}`;
    }
    if (setting.validate && !setting.validate(value)) {
      return `${key} has an invalid value`;
    }
    return undefined;
  }

  // Nested default config object built from all registered settings
  getDefaultConfig(): ConfigTree {
    const config: ConfigTree = {};

    for (const setting of this.settings.values()) {
      const keys = setting.key.split('.');
      let current = config;

      for (const key of keys.slice(0, -1)) {
        const next = current[key];
        if (isConfigTree(next)) {
          current = next;
        } else {
          const created: ConfigTree = {};
          current[key] = created;
          current = created;
        }
      }

      const value = setting.defaultValue;
      current[keys[keys.length - 1]] = Array.isArray(value) ? [...value] : value;
    }

    return config;
  }
}

// Singleton instance
export const settingsRegistry = new SettingsRegistry();

// Helper to register settings
export function registerSettings(settings: SettingDefinition[]): void {
  settingsRegistry.registerMultiple(settings);
}
