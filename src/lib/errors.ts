// Error types raised by the sourcefetch core

export class SourcefetchError extends Error {
  constructor(message: string) {
    super(message);
    this.name = new.target.name;
  }
}

// Unreadable or invalid configuration file
export class ConfigError extends SourcefetchError {
  constructor(readonly path: string, detail: string) {
    super(`Invalid configuration in ${path}: ${detail}`);
  }
}

// The provider table could not be turned into a registry
export class RegistryError extends SourcefetchError {}

export class DuplicateBackendError extends RegistryError {
  constructor(readonly backendName: string, readonly firstProvider: string, readonly secondProvider: string) {
    super(
      `Backend ${backendName} is registered by both ${firstProvider} and ${secondProvider}`
    );
  }
}

export class InvalidTransitionError extends SourcefetchError {
  constructor(readonly from: string, readonly to: string) {
    super(`Invalid run state transition from ${from} to ${to}`);
  }
}

// A backend rejected its own forwarded arguments
export class BackendArgumentError extends SourcefetchError {
  constructor(readonly backendName: string, detail: string) {
    super(`${backendName}: ${detail}`);
  }
}

export function errorMessage(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }
  return String(error);
}
