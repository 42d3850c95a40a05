import { incomplete, malformed } from "../errors";
import type { IrcCommand, StageResult } from "../types";
import { SPACE, TERMINATOR } from "./scanner";

const NUMERIC_PATTERN = /^[0-9]+$/;
const MAX_NUMERIC = 0xffff;

export const classifyCommand = (word: string): IrcCommand => {
  if (NUMERIC_PATTERN.test(word)) {
    const code = Number(word);
    if (code <= MAX_NUMERIC) return { kind: "numeric", code };
  }
  return { kind: "named", name: word };
};

export const decodeCommandAt = (line: string, from: number): StageResult<IrcCommand> => {
  const space = line.indexOf(SPACE, from);
  const terminator = line.indexOf(TERMINATOR, from);

  if (from >= line.length || terminator === from) {
    return { ok: false, error: malformed("Missing command", line, from) };
  }
  if (space === -1 && terminator === -1) {
    return { ok: false, error: incomplete("Line terminator not found", line, from) };
  }

  // The word stops at whichever of space or terminator comes first; only a space is consumed.
  const endsAtSpace = space !== -1 && (terminator === -1 || space < terminator);
  const end = endsAtSpace ? space : terminator;
  return { ok: true, value: classifyCommand(line.slice(from, end)), next: endsAtSpace ? end + SPACE.length : end };
};
