/**
 * Error classes and accumulator entries for the coercion engine
 */

import { inspect } from "node:util";

import { type ErrorContext, type ErrorKind, renderMessage } from "./messages";

const TRAILING_SLASHES_REGEX = /\/+$/;

export type LocItem = string | number;

/**
 * One failure at one location, relative to the value being coerced
 */
export type LineError = {
  readonly kind: ErrorKind;
  readonly loc: readonly LocItem[];
  readonly input: unknown;
  readonly context?: ErrorContext;
};

export function lineError(
  kind: ErrorKind,
  input: unknown,
  context?: ErrorContext
): LineError {
  return context ? { kind, loc: [], input, context } : { kind, loc: [], input };
}

export function withOuterLocation(
  error: LineError,
  item: LocItem
): LineError {
  return { ...error, loc: [item, ...error.loc] };
}

export type ErrorDetails = {
  type: ErrorKind;
  loc: LocItem[];
  msg: string;
  input?: unknown;
  ctx?: ErrorContext;
  url?: string;
};

export type ErrorsOptions = {
  includeUrl?: boolean;
  includeInput?: boolean;
  includeContext?: boolean;
};

export function inputTypeName(value: unknown): string {
  if (value === null) {
    return "null";
  }
  if (Array.isArray(value)) {
    return "Array";
  }
  if (typeof value === "object") {
    const proto: unknown = Object.getPrototypeOf(value);
    if (proto === null) {
      return "Object";
    }
    return value.constructor?.name ?? "Object";
  }
  return typeof value;
}

function formatInput(value: unknown): string {
  return inspect(value, { depth: 3, breakLength: Number.POSITIVE_INFINITY });
}

export class ValidationError extends Error {
  readonly title: string;
  readonly lineErrors: readonly LineError[];
  readonly docsUrl?: string;

  constructor(title: string, lineErrors: readonly LineError[], docsUrl?: string) {
    super(ValidationError.render(title, lineErrors));
    this.name = "ValidationError";
    this.title = title;
    this.lineErrors = lineErrors;
    this.docsUrl = docsUrl;
  }

  errorCount(): number {
    return this.lineErrors.length;
  }

  errors(options: ErrorsOptions = {}): ErrorDetails[] {
    const includeUrl = options.includeUrl ?? true;
    const includeInput = options.includeInput ?? true;
    const includeContext = options.includeContext ?? true;

    return this.lineErrors.map((error) => {
      const details: ErrorDetails = {
        type: error.kind,
        loc: [...error.loc],
        msg: renderMessage(error.kind, error.context),
      };
      if (includeInput) {
        details.input = error.input;
      }
      if (includeContext && error.context) {
        details.ctx = error.context;
      }
      if (includeUrl && this.docsUrl) {
        details.url = `${this.docsUrl.replace(TRAILING_SLASHES_REGEX, "")}/${error.kind}`;
      }
      return details;
    });
  }

  private static render(title: string, lineErrors: readonly LineError[]): string {
    const count = lineErrors.length;
    const lines = [
      `${count} validation error${count === 1 ? "" : "s"} for ${title}`,
    ];
    for (const error of lineErrors) {
      if (error.loc.length > 0) {
        lines.push(error.loc.join("."));
      }
      lines.push(
        `  ${renderMessage(error.kind, error.context)} [type=${
          error.kind
        }, input_value=${formatInput(error.input)}, input_type=${inputTypeName(
          error.input
        )}]`
      );
    }
    return lines.join("\n");
  }
}

export class SchemaDefinitionError extends Error {
  cause?: unknown;

  constructor(message: string, cause?: unknown) {
    super(message);
    this.name = "SchemaDefinitionError";
    this.cause = cause;
  }
}
