/*
Purpose: shared error formatting helpers for logs, HTTP payloads and CLI output.
Assumptions: callers only need string representations.
Usage: formatErrorMessage(err), formatErrorLines(err, { mode: "debug" }).
*/

import {
  QueueError,
  TaskAlreadyTerminalError,
  TaskNotReadyError,
  TaskTransitionError,
  TaskValidationError,
} from "./errors.js";

// =============================================================================
// TYPES
// =============================================================================

export type ErrorFormatMode = "short" | "debug";

export type ErrorFormatLineKind =
  | "title"
  | "message"
  | "issue"
  | "status"
  | "hint"
  | "code"
  | "name"
  | "cause"
  | "stack";

export type ErrorFormatLine = {
  kind: ErrorFormatLineKind;
  text: string;
};

export type AnsiStyle = "red" | "yellow" | "cyan" | "bold" | "dim";

export type AnsiFormatter = (text: string, styles: AnsiStyle[]) => string;

const ANSI_CODES: Record<AnsiStyle, [number, number]> = {
  red: [31, 39],
  yellow: [33, 39],
  cyan: [36, 39],
  bold: [1, 22],
  dim: [2, 22],
};

// =============================================================================
// MESSAGES
// =============================================================================

export function formatErrorMessage(error: unknown): string {
  if (error instanceof Error) return error.message;
  return String(error);
}

export function formatErrorLines(
  error: unknown,
  options: { mode: ErrorFormatMode },
): ErrorFormatLine[] {
  if (!(error instanceof Error)) {
    return [{ kind: "title", text: String(error) }];
  }

  const [title = "", ...rest] = error.message.split("\n");
  const lines: ErrorFormatLine[] = [{ kind: "title", text: title }];
  const detail = rest.join("\n").trim();
  if (detail) {
    lines.push({ kind: "message", text: detail });
  }

  if (error instanceof TaskValidationError) {
    for (const issue of error.issues) {
      lines.push({ kind: "issue", text: `${issue.path || "<root>"}: ${issue.message}` });
    }
  }

  const status = resolveTaskStatus(error);
  if (status) {
    lines.push({ kind: "status", text: status });
  }

  const hint = resolveHint(error);
  if (hint) {
    lines.push({ kind: "hint", text: hint });
  }

  if (error instanceof QueueError) {
    lines.push({ kind: "code", text: error.code });
  }

  const cause = error.cause;
  if (cause !== undefined && cause !== null) {
    lines.push({ kind: "cause", text: formatErrorMessage(cause) });
  }

  if (options.mode === "debug") {
    lines.push({ kind: "name", text: error.name });
    if (error.stack) {
      lines.push({ kind: "stack", text: error.stack });
    }
  }

  return lines;
}

// =============================================================================
// COLOR
// =============================================================================

export function resolveColorEnabled(options: {
  stream?: { isTTY?: boolean };
  useColor?: boolean;
}): boolean {
  if (options.stream?.isTTY !== true) return false;
  if (process.env.NO_COLOR !== undefined) return false;
  return options.useColor ?? true;
}

export function createAnsiFormatter(enabled: boolean): AnsiFormatter {
  return (text, styles) => {
    if (!enabled || styles.length === 0) return text;

    return styles.reduce((acc, style) => {
      const [open, close] = ANSI_CODES[style];
      return `\u001b[${open}m${acc}\u001b[${close}m`;
    }, text);
  };
}

function resolveTaskStatus(error: Error): string | undefined {
  if (error instanceof TaskAlreadyTerminalError || error instanceof TaskNotReadyError) {
    return error.status;
  }
  if (error instanceof TaskTransitionError) {
    return `${error.from} -> ${error.to}`;
  }
  return undefined;
}

function resolveHint(error: Error): string | undefined {
  if (!("hint" in error)) return undefined;
  const hint = error.hint;
  return typeof hint === "string" && hint.trim() ? hint : undefined;
}
