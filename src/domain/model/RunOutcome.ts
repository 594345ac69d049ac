/** Process exit codes reported for each run outcome. */
export const ExitCode = {
  SUCCESS: 0,
  MISSING_DIRECTORY: 1,
  NO_RECORDS: 2,
  NO_IDENTIFIERS: 3,
  QUERY_ABORTED: 4,
  USAGE: 64,
  /** An unexpected error ended the run. */
  INTERNAL_ERROR: 70,
} as const;

export type ExitCode = (typeof ExitCode)[keyof typeof ExitCode];

/** Counters reported when a run finishes, successfully or not. */
export interface RunSummary {
  readonly files: number;
  readonly sequences: number;
  readonly identifiers: number;
  readonly skipped: number;
  readonly batches: number;
  readonly remoteRecords: number;
  readonly rows: number;
  readonly elapsedMs: number;
}

/** Paths of the artifacts a run produced. */
export interface RunArtifacts {
  readonly reportPath: string;
  /** `null` when the run was aborted before the histogram was written. */
  readonly histogramPath: string | null;
}

/** Result of `IsolationSourceLookup.run()`, tagged by kind. */
export type RunOutcome =
  | {
      readonly status: 'completed';
      readonly exitCode: typeof ExitCode.SUCCESS;
      readonly summary: RunSummary;
      readonly artifacts: RunArtifacts;
    }
  | {
      readonly status: 'missing-directory';
      readonly exitCode: typeof ExitCode.MISSING_DIRECTORY;
      readonly directory: string;
    }
  | { readonly status: 'no-records'; readonly exitCode: typeof ExitCode.NO_RECORDS; readonly summary: RunSummary }
  | { readonly status: 'no-identifiers'; readonly exitCode: typeof ExitCode.NO_IDENTIFIERS; readonly summary: RunSummary }
  | {
      readonly status: 'aborted';
      readonly exitCode: typeof ExitCode.QUERY_ABORTED;
      readonly batchIndex: number;
      readonly error: string;
      readonly summary: RunSummary;
      readonly artifacts: RunArtifacts;
    };
