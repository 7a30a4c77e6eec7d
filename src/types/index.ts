// Type definitions for sourcefetch

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export type LoggingMode = 'normal' | 'debug';

export interface SourcefetchConfig {
  logging: {
    suppressedLoggers: string[];
  };
  output: {
    color: boolean;
  };
}

// Anything the launcher and backends print through
export interface Writer {
  write(chunk: string): unknown;
}

export interface InvocationRequest {
  backendName: string;
  forwardedArgs: readonly string[];
}

export type RunState =
  | 'start'
  | 'configured'
  | 'resolved'
  | 'running'
  | 'done'
  | 'failed'
  | 'interrupted';

export type LaunchOutcome =
  | { kind: 'done' }
  | { kind: 'usage'; message: string }
  | { kind: 'unknown-backend'; name: string }
  | { kind: 'failed'; error: unknown }
  | { kind: 'interrupted' };

export interface GitCommandResult {
  success: boolean;
  message: string;
}

export interface CommitRecord {
  hash: string;
  author: string;
  email: string;
  date: string;
  message: string;
}

export interface RefRecord {
  name: string;
  hash: string;
  date: string;
}
