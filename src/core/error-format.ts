/*
Purpose: normalize errors into user-facing lines and provide ANSI styling helpers.
Assumptions: debug mode may include stack traces; non-TTY output should disable color.
Usage: formatErrorLines(err, { mode: "debug" }); createAnsiFormatter(resolveColorEnabled({ stream })).
*/

import {
  ConfigError,
  FormatError,
  GitError,
  USER_FACING_ERROR_CODES,
  UnexpectedError,
  UserFacingError,
  type UserFacingErrorInput,
} from "./errors.js";

// =============================================================================
// TYPES
// =============================================================================

export type ErrorFormatMode = "short" | "debug";

export type ErrorFormatLineKind =
  | "title"
  | "message"
  | "hint"
  | "next"
  | "code"
  | "name"
  | "cause"
  | "stack";

export type ErrorFormatLine = {
  kind: ErrorFormatLineKind;
  text: string;
};

export type AnsiStyle = "bold" | "dim" | "red" | "yellow" | "cyan";

export type AnsiFormatter = (value: string, styles?: AnsiStyle[]) => string;

// =============================================================================
// ANSI COLOR HELPERS
// =============================================================================

const ANSI_RESET = "\x1b[0m";

const ANSI_STYLES: Record<AnsiStyle, string> = {
  bold: "\x1b[1m",
  dim: "\x1b[2m",
  red: "\x1b[31m",
  yellow: "\x1b[33m",
  cyan: "\x1b[36m",
};

export function createAnsiFormatter(enabled: boolean): AnsiFormatter {
  return (value: string, styles: AnsiStyle[] = []): string => {
    if (!enabled || styles.length === 0) {
      return value;
    }

    const prefix = styles.map((style) => ANSI_STYLES[style]).join("");
    return `${prefix}${value}${ANSI_RESET}`;
  };
}

export function resolveColorEnabled(
  options: { stream?: { isTTY?: boolean }; useColor?: boolean } = {},
): boolean {
  const stream = options.stream ?? process.stderr;
  const isTty = Boolean(stream.isTTY);

  if (options.useColor === undefined) {
    return isTty;
  }

  return options.useColor && isTty;
}

// =============================================================================
// ERROR FORMATTING
// =============================================================================

export function formatErrorLines(
  error: unknown,
  options: { mode?: ErrorFormatMode } = {},
): ErrorFormatLine[] {
  const mode = options.mode ?? "short";
  const normalized = normalizeUserFacingError(error);
  const lines: ErrorFormatLine[] = [{ kind: "title", text: normalized.title }];

  if (normalized.message.trim() !== normalized.title.trim()) {
    lines.push({ kind: "message", text: normalized.message });
  }
  if (normalized.hint) {
    lines.push({ kind: "hint", text: normalized.hint });
  }
  if (normalized.next) {
    lines.push({ kind: "next", text: normalized.next });
  }

  if (mode === "debug") {
    lines.push({ kind: "code", text: normalized.code });

    if (error instanceof Error && error.name) {
      lines.push({ kind: "name", text: error.name });
    }

    const cause = normalized.cause === undefined ? undefined : formatErrorMessage(normalized.cause);
    if (cause && cause !== normalized.message) {
      lines.push({ kind: "cause", text: cause });
    }

    const stack = resolveDebugStack(error, normalized.cause);
    if (stack) {
      lines.push({ kind: "stack", text: stack });
    }
  }

  return lines;
}

export function formatErrorMessage(error: unknown): string {
  if (error instanceof Error) {
    const message = error.message.trim();
    return message.length > 0 ? message : error.name;
  }

  // GitError causes carry the captured process output.
  if (error && typeof error === "object" && "stderr" in error) {
    const { stderr } = error;
    if (typeof stderr === "string" && stderr.trim().length > 0) {
      return stderr.trim();
    }
  }

  return String(error);
}

// =============================================================================
// INTERNALS
// =============================================================================

const DEFAULT_ERROR_TITLE = "Unexpected error";

function normalizeUserFacingError(error: unknown): UserFacingErrorInput {
  if (error instanceof UserFacingError) {
    return {
      code: error.code,
      title: error.title,
      message: error.message,
      hint: error.hint,
      next: error.next,
      cause: error.cause,
    };
  }

  if (error instanceof ConfigError) {
    return {
      code: USER_FACING_ERROR_CODES.config,
      title: "Configuration error.",
      message: error.message,
      hint: "Check the config file and repository database, then rerun.",
      cause: error.cause,
    };
  }

  if (error instanceof FormatError) {
    return {
      code: USER_FACING_ERROR_CODES.format,
      title: "Malformed version.",
      message: error.message,
      cause: error.cause,
    };
  }

  if (error instanceof GitError) {
    return {
      code: USER_FACING_ERROR_CODES.git,
      title: "Git command failed.",
      message: error.message,
      hint: "Rerun the command once the repository or network problem is resolved.",
      cause: error.cause,
    };
  }

  if (error instanceof UnexpectedError) {
    return {
      code: USER_FACING_ERROR_CODES.unexpected,
      title: "Repository state is not what was expected.",
      message: error.message,
      cause: error.cause,
    };
  }

  return {
    code: USER_FACING_ERROR_CODES.unknown,
    title: DEFAULT_ERROR_TITLE,
    message: formatErrorMessage(error),
    cause: error instanceof Error ? error.cause : undefined,
  };
}

function resolveDebugStack(error: unknown, cause?: unknown): string | undefined {
  if (error instanceof Error && error.stack) {
    return error.stack;
  }

  if (cause instanceof Error && cause.stack) {
    return cause.stack;
  }

  return undefined;
}
