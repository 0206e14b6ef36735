/**
 * DispatchOutcome enum
 * Terminal state of one user's dispatch for one slot run
 *
 * DISABLED | NO_CREDENTIAL | SLOT_ALREADY_SENT
 * FETCHING → SELECTING → EMPTY
 *                      → READY → DRY_RUN
 *                              → SENDING → SENT (recorded) | SEND_FAILED
 * FETCH_FAILED covers failures while fetching or selecting, ERROR anything unexpected.
 */
export enum DispatchOutcome {
  DISABLED = 'DISABLED',
  NO_CREDENTIAL = 'NO_CREDENTIAL',
  SLOT_ALREADY_SENT = 'SLOT_ALREADY_SENT',
  FETCH_FAILED = 'FETCH_FAILED',
  EMPTY = 'EMPTY',
  DRY_RUN = 'DRY_RUN',
  SENT = 'SENT',
  SEND_FAILED = 'SEND_FAILED',
  ERROR = 'ERROR',
}

const SUCCESSFUL_OUTCOMES: ReadonlySet<DispatchOutcome> = new Set([
  DispatchOutcome.DISABLED,
  DispatchOutcome.SLOT_ALREADY_SENT,
  DispatchOutcome.EMPTY,
  DispatchOutcome.DRY_RUN,
  DispatchOutcome.SENT,
]);

/**
 * Whether the outcome counts as a successful user in the run summary
 */
export function isSuccessfulOutcome(outcome: DispatchOutcome): boolean {
  return SUCCESSFUL_OUTCOMES.has(outcome);
}
