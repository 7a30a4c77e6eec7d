// Command launcher - turns raw tokens into exactly one backend run

import { Command as CommanderCommand, CommanderError } from 'commander';
import { InvocationRequest, LaunchOutcome, SourcefetchConfig, Writer } from '../types';
import { PROGRAM_NAME, VERSION } from '../constants';
import { BackendCommand, BackendContext, BackendProvider } from './backend';
import { BackendRegistry } from './registry';
import { Logger, LoggingProfile, configureLogging } from './logger';
import { RunTracker } from './run-state';

const DESCRIPTION = 'Fetch data from software repositories and other sources through pluggable backends.';

const EPILOG = `
Run '${PROGRAM_NAME} <backend> --help' to list the options of a backend.`;

export interface LauncherOptions {
  // Read only once the request is known to need a backend
  providers: () => readonly BackendProvider[];
  loadConfig: () => SourcefetchConfig;
  stdout?: Writer;
  stderr?: Writer;
  signal?: AbortSignal;
  tracker?: RunTracker;
  clock?: () => Date;
}

type ParseResult =
  | { kind: 'request'; request: InvocationRequest; debug: boolean }
  | { kind: 'exit'; outcome: LaunchOutcome };

export function buildProgram(stdout: Writer, stderr: Writer): CommanderCommand {
  return new CommanderCommand(PROGRAM_NAME)
    .description(DESCRIPTION)
    .usage('[-h] [-v] [-g] <backend> [<backend_args>...]')
    .version(`${PROGRAM_NAME} ${VERSION}`, '-v, --version', 'show version')
    .helpOption('-h, --help', 'show this help message and exit')
    .option('-g, --debug', 'set debug mode on')
    .argument('<backend>', 'backend to run')
    .argument('[backend_args...]', 'arguments passed to the backend')
    .passThroughOptions()
    .exitOverride()
    .configureOutput({
      writeOut: (text) => {
        stdout.write(text);
      },
      writeErr: (text) => {
        stderr.write(text);
      }
    })
    .addHelpText('after', EPILOG);
}

/**
 * Splits the command line at the backend name. Nothing after the name is
 * looked at: it becomes the forwarded argument list as given.
 */
export function parseInvocation(argv: readonly string[], stdout: Writer, stderr: Writer): ParseResult {
  const program = buildProgram(stdout, stderr);

  if (argv.length === 0) {
    stderr.write(program.helpInformation());
    return { kind: 'exit', outcome: { kind: 'usage', message: 'no arguments given' } };
  }

  const captured: { request?: InvocationRequest } = {};
  program.action((backendName: string, forwardedArgs: string[]) => {
    captured.request = { backendName, forwardedArgs: Object.freeze([...forwardedArgs]) };
  });

  try {
    program.parse([...argv], { from: 'user' });
  } catch (error) {
    if (!(error instanceof CommanderError)) {
      throw error;
    }
    if (error.exitCode === 0) {
      // --help or --version, already printed
      return { kind: 'exit', outcome: { kind: 'done' } };
    }
    return { kind: 'exit', outcome: { kind: 'usage', message: error.message } };
  }

  if (captured.request === undefined) {
    return { kind: 'exit', outcome: { kind: 'usage', message: 'missing backend' } };
  }

  return { kind: 'request', request: captured.request, debug: program.opts().debug === true };
}

// Two check phases, so a signal queued while run() blocked gets a poll phase
function nextLoopTurn(): Promise<void> {
  return new Promise(resolve => {
    setImmediate(() => setImmediate(resolve));
  });
}

function settle(pending: Promise<void>, signal: AbortSignal): Promise<'done' | 'interrupted'> {
  return new Promise((resolve, reject) => {
    if (signal.aborted) {
      resolve('interrupted');
      return;
    }
    const onAbort = (): void => resolve('interrupted');
    signal.addEventListener('abort', onAbort, { once: true });
    pending.then(nextLoopTurn).then(
      () => {
        signal.removeEventListener('abort', onAbort);
        resolve(signal.aborted ? 'interrupted' : 'done');
      },
      (error: unknown) => {
        signal.removeEventListener('abort', onAbort);
        reject(error);
      }
    );
  });
}

async function dispatch(
  request: InvocationRequest,
  debug: boolean,
  options: LauncherOptions,
  tracker: RunTracker,
  signal: AbortSignal
): Promise<LaunchOutcome> {
  const config = options.loadConfig();
  const logging: LoggingProfile = configureLogging({
    debug,
    suppressedLoggers: config.logging.suppressedLoggers,
    color: config.output.color,
    sink: options.stderr ?? process.stderr,
    clock: options.clock
  });
  tracker.advance('configured');

  const logger = logging.getLogger(PROGRAM_NAME);
  logger.debug('Debug mode activated');

  const registry = BackendRegistry.discover(options.providers());
  logger.debug(`Backends available: ${registry.names().join(', ')}`);

  const descriptor = registry.lookup(request.backendName);
  if (!descriptor) {
    return { kind: 'unknown-backend', name: request.backendName };
  }
  tracker.advance('resolved');
  logger.debug(`Resolved backend ${descriptor.name} from provider ${registry.providerOf(descriptor.name) ?? 'unknown'}`);

  if (signal.aborted) {
    return { kind: 'interrupted' };
  }

  const context: BackendContext = {
    logging,
    signal,
    stdout: options.stdout ?? process.stdout
  };

  let command: BackendCommand;
  let pending: Promise<void>;
  try {
    command = new descriptor.executable(request.forwardedArgs, context);
    tracker.advance('running');
    logger.debug(`Running backend ${descriptor.name} with ${request.forwardedArgs.length} argument(s)`);
    pending = Promise.resolve(command.run());
  } catch (error) {
    logStack(logger, error);
    return { kind: 'failed', error };
  }

  try {
    const result = await settle(pending, signal);
    if (result === 'interrupted') {
      return { kind: 'interrupted' };
    }
  } catch (error) {
    logStack(logger, error);
    return { kind: 'failed', error };
  }

  logger.debug(`Backend ${descriptor.name} finished`);
  return { kind: 'done' };
}

// Only visible in the debug profile
function logStack(logger: Logger, error: unknown): void {
  if (error instanceof Error && error.stack) {
    logger.debug(error.stack);
  }
}

export async function launch(argv: readonly string[], options: LauncherOptions): Promise<LaunchOutcome> {
  const stdout = options.stdout ?? process.stdout;
  const stderr = options.stderr ?? process.stderr;
  const tracker = options.tracker ?? new RunTracker();
  const signal = options.signal ?? new AbortController().signal;

  const parsed = parseInvocation(argv, stdout, stderr);
  if (parsed.kind === 'exit') {
    return parsed.outcome;
  }

  try {
    return await dispatch(parsed.request, parsed.debug, options, tracker, signal);
  } catch (error) {
    // Config, registry or state machine failure before the backend ran
    return { kind: 'failed', error };
  }
}
