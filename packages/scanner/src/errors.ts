/* =============================================================================
 * SCAN ERRORS
 * ============================================================================= */

/**
 * A malformed `#[derive]` attribute on one declaration. Collected across a
 * whole scan rather than thrown on sight.
 */
export interface DeriveIssue {
  readonly file: string;
  readonly line: number;
  readonly column: number;
  /** Name of the struct or enum carrying the attribute. */
  readonly declaration: string;
  readonly message: string;
}

/** Error codes */
export const ScanErrorCode = {
  WALK_FAILED: "SCAN_WALK_FAILED",
  READ_FAILED: "SCAN_READ_FAILED",
  PARSE_FAILED: "SCAN_PARSE_FAILED",
  INVALID_DERIVE: "SCAN_INVALID_DERIVE",
} as const;

export type ScanErrorCodeType = (typeof ScanErrorCode)[keyof typeof ScanErrorCode];

/**
 * Error during a scan.
 *
 * Walk, read and parse failures abort the scan. `SCAN_INVALID_DERIVE` is the
 * aggregate of every DeriveIssue found once all files have been scanned.
 */
export class ScanError extends Error {
  readonly issues: readonly DeriveIssue[];

  constructor(
    message: string,
    public readonly code: ScanErrorCodeType,
    public readonly path?: string,
    options?: { cause?: unknown; issues?: readonly DeriveIssue[] },
  ) {
    super(message, options?.cause === undefined ? undefined : { cause: options.cause });
    this.name = "ScanError";
    this.issues = options?.issues ?? [];
  }

  static fromIssues(issues: readonly DeriveIssue[]): ScanError {
    const header =
      issues.length === 1 ? "Invalid #[derive] attribute" : `${issues.length} invalid #[derive] attributes`;
    const lines = issues.map(formatIssue);
    return new ScanError(`${header}:\n${lines.join("\n")}`, ScanErrorCode.INVALID_DERIVE, issues[0]?.file, {
      issues,
    });
  }

  /** Absorb another aggregate error; the receiver's issues come first. */
  combine(other: ScanError): ScanError {
    return ScanError.fromIssues([...this.issues, ...other.issues]);
  }
}

export function formatIssue(issue: DeriveIssue): string {
  return `  ${issue.file}:${issue.line}:${issue.column}: ${issue.message} (on \`${issue.declaration}\`)`;
}

export function isScanError(error: unknown): error is ScanError {
  return error instanceof ScanError;
}

export function isNodeError(error: unknown): error is NodeJS.ErrnoException {
  return error instanceof Error && "code" in error;
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
