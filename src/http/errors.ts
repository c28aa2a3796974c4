// HTTP error helpers.
// Purpose: map queue errors onto the canonical API error payload and status code.
// Assumes API failures respond with { ok: false, error: { code, message, details? } }.
// Usage: const { status, payload } = mapQueueError(err).

import {
  QueueError,
  TaskAlreadyTerminalError,
  TaskForbiddenError,
  TaskNotFoundError,
  TaskNotReadyError,
  TaskValidationError,
} from "../core/errors.js";

// =============================================================================
// TYPES
// =============================================================================

export type ApiErrorDetails = Record<string, unknown>;

export type ApiErrorPayload = {
  ok: false;
  error: {
    code: string;
    message: string;
    details?: ApiErrorDetails;
  };
};

export type MappedApiError = {
  status: number;
  payload: ApiErrorPayload;
};

// =============================================================================
// ERROR BUILDERS
// =============================================================================

export function buildApiErrorPayload(params: {
  code: string;
  message: string;
  details?: ApiErrorDetails;
}): ApiErrorPayload {
  const error = {
    code: params.code,
    message: params.message,
    ...(params.details ? { details: params.details } : {}),
  };

  return { ok: false, error };
}

// Forbidden answers exactly like an unknown id so task ids cannot be probed.
export function mapQueueError(err: unknown): MappedApiError {
  if (err instanceof TaskNotFoundError || err instanceof TaskForbiddenError) {
    return {
      status: 404,
      payload: buildApiErrorPayload({
        code: "job_not_found",
        message: `Job ${err.taskId} not found.`,
      }),
    };
  }

  if (err instanceof TaskValidationError) {
    return {
      status: 422,
      payload: buildApiErrorPayload({
        code: err.code,
        message: err.message,
        details: { issues: err.issues },
      }),
    };
  }

  if (err instanceof TaskAlreadyTerminalError) {
    return {
      status: 409,
      payload: buildApiErrorPayload({
        code: err.code,
        message: err.message,
        details: { status: err.status },
      }),
    };
  }

  if (err instanceof TaskNotReadyError) {
    return {
      status: 425,
      payload: buildApiErrorPayload({
        code: err.code,
        message: err.message,
        details: { status: err.status },
      }),
    };
  }

  return {
    status: 500,
    payload: buildApiErrorPayload({
      code: "internal_error",
      message: "Unexpected server error.",
      details: buildInternalErrorDetails(err),
    }),
  };
}

export function buildInternalErrorDetails(cause: unknown): ApiErrorDetails {
  const details: ApiErrorDetails = { reason: "unexpected_error" };

  if (cause instanceof QueueError && cause.code.trim()) {
    details.error_code = cause.code;
  }

  return details;
}
