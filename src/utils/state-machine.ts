export type RunStatus = 'running' | 'completed' | 'failed';

const RUN_TRANSITIONS: Record<RunStatus, RunStatus[]> = {
  running: ['completed', 'failed'],
  completed: [],
  failed: [],
};

export function transitionRunStatus(current: RunStatus, next: RunStatus): RunStatus {
  if (!RUN_TRANSITIONS[current].includes(next)) {
    throw new Error(`Invalid run status transition: '${current}' → '${next}'`);
  }
  return next;
}

export function isTerminalRunStatus(status: RunStatus): boolean {
  return RUN_TRANSITIONS[status].length === 0;
}
