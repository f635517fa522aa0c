export type SpatialNotebookErrorCode =
  | "document_parse"
  | "file_read"
  | "connection"
  | "kernel_unavailable"
  | "execution_failure"
  | "cell_conversion";

export class SpatialNotebookError extends Error {
  constructor(
    message: string,
    readonly code: SpatialNotebookErrorCode,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = "SpatialNotebookError";
  }
}

/** Malformed JSON, or a document without a `cells` array. */
export class DocumentParseError extends SpatialNotebookError {
  declare readonly code: "document_parse";

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, "document_parse", options);
    this.name = "DocumentParseError";
  }
}

export class FileReadError extends SpatialNotebookError {
  declare readonly code: "file_read";

  constructor(
    readonly path: string,
    options?: { cause?: unknown }
  ) {
    super(`Could not read file '${path}'`, "file_read", options);
    this.name = "FileReadError";
  }
}

/** Server unreachable, request timed out, or credentials rejected. */
export class ConnectionError extends SpatialNotebookError {
  declare readonly code: "connection";

  constructor(
    message: string,
    readonly status?: number,
    options?: { cause?: unknown }
  ) {
    super(message, "connection", options);
    this.name = "ConnectionError";
  }
}

export class KernelUnavailable extends SpatialNotebookError {
  declare readonly code: "kernel_unavailable";

  constructor(message = "No kernel available for execution") {
    super(message, "kernel_unavailable");
    this.name = "KernelUnavailable";
  }
}

export class ExecutionFailure extends SpatialNotebookError {
  declare readonly code: "execution_failure";

  constructor(
    readonly ename: string,
    readonly evalue: string
  ) {
    super(`Execution failed: ${ename}: ${evalue}`, "execution_failure");
    this.name = "ExecutionFailure";
  }
}

export class CellConversionError extends SpatialNotebookError {
  declare readonly code: "cell_conversion";

  constructor(
    message: string,
    readonly cellIndex: number,
    readonly candidateId: number,
    options?: { cause?: unknown }
  ) {
    super(message, "cell_conversion", options);
    this.name = "CellConversionError";
  }
}

export type ImportError =
  | DocumentParseError
  | FileReadError
  | CellConversionError;

export type RemoteError =
  | ConnectionError
  | DocumentParseError
  | KernelUnavailable
  | ExecutionFailure;

export type Outcome<T, E extends SpatialNotebookError = RemoteError> =
  | { ok: true; value: T }
  | { ok: false; error: E };

export const succeed = <T>(value: T): { ok: true; value: T } => ({
  ok: true,
  value,
});

export const fail = <E extends SpatialNotebookError>(
  error: E
): { ok: false; error: E } => ({ ok: false, error });

export const describeError = (error: unknown): string => {
  if (error instanceof Error) {
    return error.message || error.name;
  }
  if (typeof error === "string") {
    return error;
  }
  return "Unknown error";
};
