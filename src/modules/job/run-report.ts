export type RunState =
  | 'idle'
  | 'provisioning'
  | 'connecting'
  | 'generating'
  | 'inserting'
  | 'done'
  | 'aborted';

/** States a run can abort from. */
export type RunStage = Exclude<RunState, 'done' | 'aborted'>;

export interface RunReport {
  runId: string;
  state: 'done' | 'aborted';
  /** Set when `state` is `aborted`. */
  failedStage?: RunStage;
  pastDue: boolean;
  startedAt: string;
  finishedAt: string;
  durationMs: number;
  insertedRows: number;
  error?: string;
}
