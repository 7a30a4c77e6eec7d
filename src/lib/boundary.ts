// Error/signal boundary - the one place run outcomes become exit codes

import { LaunchOutcome, SourcefetchConfig, Writer } from '../types';
import { EXIT_FAILURE, EXIT_SUCCESS, INTERRUPT_MESSAGE } from '../constants';
import { LauncherOptions, launch } from './launcher';
import { RunTracker, terminalStateFor } from './run-state';
import { errorMessage } from './errors';
import { Painter, createPainter } from './logger';

export interface SignalSource {
  on(event: 'SIGINT', listener: () => void): unknown;
  removeListener(event: 'SIGINT', listener: () => void): unknown;
}

export interface BoundaryOptions extends Omit<LauncherOptions, 'signal' | 'tracker'> {
  signals?: SignalSource;
  tracker?: RunTracker;
}

export function exitCodeFor(outcome: LaunchOutcome): number {
  switch (outcome.kind) {
    case 'done':
    case 'interrupted':
      return EXIT_SUCCESS;
    default:
      return EXIT_FAILURE;
  }
}

export function reportOutcome(outcome: LaunchOutcome, stderr: Writer, paint: Painter): void {
  switch (outcome.kind) {
    case 'unknown-backend':
      stderr.write(paint.red(`Unknown backend ${outcome.name}`) + '\n');
      break;
    case 'failed':
      stderr.write(paint.red(`Error: ${errorMessage(outcome.error)}`) + '\n');
      break;
    case 'interrupted':
      stderr.write(`\n${INTERRUPT_MESSAGE}\n`);
      break;
    default:
      // done is silent; usage text was printed by the launcher
      break;
  }
}

/**
 * Runs the launcher with SIGINT wired to an abort signal, reports the outcome
 * on stderr and returns the exit code. Never throws for backend failures.
 */
export async function runWithBoundary(argv: readonly string[], options: BoundaryOptions): Promise<number> {
  const signals: SignalSource = options.signals ?? process;
  const stderr = options.stderr ?? process.stderr;
  const tracker = options.tracker ?? new RunTracker();
  const controller = new AbortController();
  const onInterrupt = (): void => {
    controller.abort();
  };

  // Kept so the outcome is painted with the settings the run loaded
  const loaded: { config?: SourcefetchConfig } = {};
  const loadConfig = (): SourcefetchConfig => {
    loaded.config = options.loadConfig();
    return loaded.config;
  };

  signals.on('SIGINT', onInterrupt);
  let outcome: LaunchOutcome;
  try {
    outcome = await launch(argv, { ...options, loadConfig, stderr, signal: controller.signal, tracker });
  } finally {
    signals.removeListener('SIGINT', onInterrupt);
  }

  tracker.advance(terminalStateFor(outcome));
  reportOutcome(outcome, stderr, createPainter(loaded.config?.output.color ?? true));
  return exitCodeFor(outcome);
}
