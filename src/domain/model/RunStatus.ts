/**
 * Finite state machine for the lifecycle of one lookup run.
 *
 * Valid transitions:
 * - `CREATED` → `LOADING`
 * - `LOADING` → `FETCHING` | `FAILED`
 * - `FETCHING` → `COMPLETED` | `ABORTED` | `FAILED`
 * - `COMPLETED`, `ABORTED`, `FAILED` → (terminal)
 */
export const RunStatus = {
  CREATED: 'CREATED',
  LOADING: 'LOADING',
  FETCHING: 'FETCHING',
  COMPLETED: 'COMPLETED',
  ABORTED: 'ABORTED',
  FAILED: 'FAILED',
} as const;

export type RunStatus = (typeof RunStatus)[keyof typeof RunStatus];

const VALID_TRANSITIONS: Record<RunStatus, readonly RunStatus[]> = {
  [RunStatus.CREATED]: [RunStatus.LOADING],
  [RunStatus.LOADING]: [RunStatus.FETCHING, RunStatus.FAILED],
  [RunStatus.FETCHING]: [RunStatus.COMPLETED, RunStatus.ABORTED, RunStatus.FAILED],
  [RunStatus.COMPLETED]: [],
  [RunStatus.ABORTED]: [],
  [RunStatus.FAILED]: [],
};

/** Check whether a state transition is valid according to the run lifecycle FSM. */
export function canTransition(from: RunStatus, to: RunStatus): boolean {
  return VALID_TRANSITIONS[from].includes(to);
}
