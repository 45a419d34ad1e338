import { type LineError, lineError } from "../errors/types";
import { decodeUtf8, type InputValue, readInput } from "./canonical";

export type JsonReadResult =
  | { ok: true; input: InputValue }
  | { ok: false; error: LineError };

function describeJsonError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * Parses JSON text (or UTF-8 bytes) into an InputValue tree in `json` mode
 */
export function readJsonInput(json: unknown): JsonReadResult {
  let text: string | undefined;
  if (typeof json === "string") {
    text = json;
  } else if (json instanceof Uint8Array) {
    text = decodeUtf8(json);
    if (text === undefined) {
      return {
        ok: false,
        error: lineError("json_invalid", json, {
          error: "invalid UTF-8 sequence",
        }),
      };
    }
  } else {
    return { ok: false, error: lineError("json_type", json) };
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(text);
  } catch (error) {
    return {
      ok: false,
      error: lineError("json_invalid", json, {
        error: describeJsonError(error),
      }),
    };
  }
  return { ok: true, input: readInput(parsed, "json") };
}
