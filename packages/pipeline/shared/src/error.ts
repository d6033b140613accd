export type PipelineErrorCode =
  | "generation_error"
  | "generation_not_initialized"
  | "session_not_found"
  | "task_state_error"
  | "transcription_error"
  | "config_error"

export interface PipelineError {
  code: PipelineErrorCode
  message: string
  recoverable: boolean
  details?: Record<string, unknown>
}

export class PipelineStageError extends Error implements PipelineError {
  code: PipelineErrorCode
  recoverable: boolean
  details?: Record<string, unknown>

  constructor(code: PipelineErrorCode, message: string, recoverable: boolean, details?: Record<string, unknown>) {
    super(message)
    this.name = "PipelineStageError"
    this.code = code
    this.recoverable = recoverable
    this.details = details
  }
}

/**
 * Raised when a background task handle is misused: reading the outcome while
 * the task still runs, or reading it a second time.
 */
export class TaskStateError extends PipelineStageError {
  constructor(message: string) {
    super("task_state_error", message, false)
    this.name = "TaskStateError"
  }
}

const PIPELINE_ERROR_CODES: readonly string[] = [
  "generation_error",
  "generation_not_initialized",
  "session_not_found",
  "task_state_error",
  "transcription_error",
  "config_error",
]

function isPipelineErrorCode(value: unknown): value is PipelineErrorCode {
  return typeof value === "string" && PIPELINE_ERROR_CODES.includes(value)
}

export function createPipelineError(
  code: PipelineErrorCode,
  message: string,
  recoverable: boolean,
  details?: Record<string, unknown>,
): PipelineError {
  return { code, message, recoverable, details }
}

export function isPipelineError(error: unknown): error is PipelineError {
  if (!error || typeof error !== "object") return false
  return (
    "code" in error &&
    isPipelineErrorCode(error.code) &&
    "message" in error &&
    typeof error.message === "string" &&
    "recoverable" in error &&
    typeof error.recoverable === "boolean"
  )
}

export function toPipelineError(
  error: unknown,
  fallback: {
    code: PipelineErrorCode
    message: string
    recoverable: boolean
    details?: Record<string, unknown>
  },
): PipelineError {
  if (error instanceof PipelineStageError) {
    return createPipelineError(error.code, error.message, error.recoverable, error.details)
  }

  if (isPipelineError(error)) {
    return createPipelineError(error.code, error.message, error.recoverable, error.details)
  }

  if (error instanceof Error) {
    return createPipelineError(
      fallback.code,
      error.message || fallback.message,
      fallback.recoverable,
      fallback.details,
    )
  }

  return createPipelineError(
    fallback.code,
    typeof error === "string" ? error : fallback.message,
    fallback.recoverable,
    fallback.details,
  )
}

export function toPipelineStageError(
  error: unknown,
  fallback: {
    code: PipelineErrorCode
    message: string
    recoverable: boolean
    details?: Record<string, unknown>
  },
): PipelineStageError {
  if (error instanceof PipelineStageError) {
    return error
  }
  const normalized = toPipelineError(error, fallback)
  return new PipelineStageError(normalized.code, normalized.message, normalized.recoverable, normalized.details)
}
