// Linear run state machine shared by the launcher and the error boundary

import { LaunchOutcome, RunState } from '../types';
import { InvalidTransitionError } from './errors';

const TRANSITIONS: Record<RunState, readonly RunState[]> = {
  // help and version finish straight from start
  start: ['configured', 'done', 'failed', 'interrupted'],
  configured: ['resolved', 'failed', 'interrupted'],
  resolved: ['running', 'failed', 'interrupted'],
  running: ['done', 'failed', 'interrupted'],
  done: [],
  failed: [],
  interrupted: [],
};

export function terminalStateFor(outcome: LaunchOutcome): RunState {
  switch (outcome.kind) {
    case 'done':
      return 'done';
    case 'interrupted':
      return 'interrupted';
    default:
      return 'failed';
  }
}

export class RunTracker {
  private current: RunState = 'start';
  private readonly visited: RunState[] = ['start'];

  get state(): RunState {
    return this.current;
  }

  get history(): readonly RunState[] {
    return this.visited;
  }

  get finished(): boolean {
    return TRANSITIONS[this.current].length === 0;
  }

  advance(next: RunState): void {
    if (!TRANSITIONS[this.current].includes(next)) {
      throw new InvalidTransitionError(this.current, next);
    }
    this.current = next;
    this.visited.push(next);
  }
}
