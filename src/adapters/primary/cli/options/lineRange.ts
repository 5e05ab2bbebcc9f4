import { InvalidArgumentError } from "commander";
import { LineRange } from "../../../../domain/model/ScaffoldOptions";
import { splitLines } from "../../../../shared/utils/textUtils";
import { USER_MESSAGES } from "../constants/userMessages";

/**
 * Interpreta `12-40` (o `12`) como rango de líneas base 1
 */
export function parseLineRange(value: string): LineRange {
  const match = /^\s*(\d+)\s*(?:-\s*(\d+))?\s*$/.exec(value);
  if (!match) {
    throw new InvalidArgumentError(USER_MESSAGES.ERRORS.INVALID_LINE_RANGE(value));
  }
  const start = Number(match[1]);
  const end = match[2] === undefined ? start : Number(match[2]);
  if (start < 1 || end < start) {
    throw new InvalidArgumentError(USER_MESSAGES.ERRORS.INVALID_LINE_RANGE(value));
  }
  return { start, end };
}

/**
 * Texto de la selección: las líneas del rango, ambos extremos incluidos
 */
export function selectLines(text: string, range: LineRange): string {
  return splitLines(text)
    .slice(range.start - 1, range.end)
    .join("\n");
}
