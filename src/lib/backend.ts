// Backend contract and base class for pluggable backends

import { Command as CommanderCommand, CommanderError } from 'commander';
import { Writer } from '../types';
import { Logger, LoggingProfile } from './logger';
import { BackendArgumentError } from './errors';

export interface BackendContext {
  logging: LoggingProfile;
  signal: AbortSignal;
  stdout: Writer;
}

export interface BackendCommand {
  run(): void | Promise<void>;
}

// What the core constructs: raw forwarded tokens in, runnable command out
export type BackendCommandType = new (args: readonly string[], context: BackendContext) => BackendCommand;

export interface BackendDescriptor {
  readonly name: string;
  readonly description: string;
  readonly executable: BackendCommandType;
}

// One entry of the fixed provider table
export interface BackendProvider {
  name: string;
  backends(): BackendDescriptor[];
}

export interface BackendConfig {
  name: string;
  description: string;
  arguments?: string;
  options?: Array<{
    flags: string;
    description: string;
    defaultValue?: string | boolean;
  }>;
}

export type OptionValues = Readonly<Record<string, unknown>>;

/**
 * Base for backends that describe their own argument grammar with commander.
 * Forwarded tokens are parsed here, inside the backend, never by the launcher.
 */
export abstract class BaseBackendCommand<TOptions> implements BackendCommand {
  protected readonly logger: Logger;
  protected readonly options: TOptions;
  private helpShown = false;

  constructor(
    protected readonly config: BackendConfig,
    args: readonly string[],
    protected readonly context: BackendContext
  ) {
    this.logger = context.logging.getLogger(config.name);
    const program = this.buildParser();

    try {
      program.parse([...args], { from: 'user' });
    } catch (error) {
      if (!(error instanceof CommanderError)) {
        throw error;
      }
      if (error.code !== 'commander.helpDisplayed') {
        throw new BackendArgumentError(config.name, error.message);
      }
      this.helpShown = true;
    }

    this.options = this.parseOptions(program.opts(), program.args);
  }

  async run(): Promise<void> {
    if (this.helpShown) {
      return;
    }
    this.logger.debug(`Running ${this.config.name} backend`);
    await this.execute();
  }

  // Turn commander's raw values into the backend's typed options
  protected abstract parseOptions(values: OptionValues, positionals: string[]): TOptions;

  protected abstract execute(): Promise<void>;

  protected emit(record: object): void {
    this.context.stdout.write(JSON.stringify(record) + '\n');
  }

  private buildParser(): CommanderCommand {
    let program = new CommanderCommand(this.config.name)
      .description(this.config.description)
      .exitOverride()
      .allowExcessArguments(false)
      .configureOutput({
        writeOut: (text) => {
          this.context.stdout.write(text);
        },
        // Parse errors resurface as BackendArgumentError
        writeErr: () => undefined
      });

    if (this.config.arguments) {
      program = program.arguments(this.config.arguments);
    }

    for (const option of this.config.options ?? []) {
      if (option.defaultValue !== undefined) {
        program.option(option.flags, option.description, option.defaultValue);
      } else {
        program.option(option.flags, option.description);
      }
    }

    return program;
  }
}

export function readString(values: OptionValues, key: string): string | undefined {
  const value = values[key];
  return typeof value === 'string' ? value : undefined;
}

export function readFlag(values: OptionValues, key: string): boolean {
  return values[key] === true;
}
