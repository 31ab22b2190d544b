export type ReleasePrErrorCode =
  | "INVALID_REMOTE"
  | "GIT_COMMAND_FAILED"
  | "GITHUB_API_ERROR"
  | "AUTH_CHALLENGE"
  | "AUTH_FAILED"
  | "CREATE_FAILED"
  | "UPDATE_FAILED"
  | "LABEL_FAILED";

/**
 * Error with a code the CLI can map to an exit status.
 */
export class ReleasePrError extends Error {
  constructor(
    message: string,
    public code: ReleasePrErrorCode,
    public details?: Record<string, unknown>
  ) {
    super(message);
    this.name = "ReleasePrError";
  }
}

export const ExitCode = {
  Success: 0,
  NothingToRelease: 1,
  CreateFailed: 2,
  UpdateFailed: 3,
  LabelFailed: 4,
} as const;

export type ExitCode = (typeof ExitCode)[keyof typeof ExitCode];

// Uncaught failures exit 1 like any crashed node process.
const UNEXPECTED_FAILURE = 1;

export function exitCodeFor(error: unknown): ExitCode {
  if (error instanceof ReleasePrError) {
    switch (error.code) {
      case "CREATE_FAILED":
        return ExitCode.CreateFailed;
      case "UPDATE_FAILED":
        return ExitCode.UpdateFailed;
      case "LABEL_FAILED":
        return ExitCode.LabelFailed;
      default:
        return UNEXPECTED_FAILURE;
    }
  }
  return UNEXPECTED_FAILURE;
}
