/**
 * What the scheduler knows about the tick that started a run.
 */
export interface TriggerInfo {
  /** The tick fired later than scheduled by more than the tolerance. */
  pastDue: boolean;
  firedAt: Date;
}

export function isPastDue(expectedAt: Date, firedAt: Date, toleranceMs: number): boolean {
  return firedAt.getTime() - expectedAt.getTime() > toleranceMs;
}
