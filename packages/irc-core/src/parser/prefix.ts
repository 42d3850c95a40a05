import { malformed, type DecodeError } from "../errors";
import type { IrcPrefix, StageResult } from "../types";
import { TERMINATOR, takeUntil, takeWord } from "./scanner";

export const PREFIX_MARKER = ":";

export type PrefixResult = { ok: true; prefix?: IrcPrefix; rest: string } | { ok: false; error: DecodeError };

// nick!user@host, where the host takes everything after the first "@" that follows the "!".
export const parseUserIdentity = (word: string): IrcPrefix | null => {
  const nick = takeUntil(word, "!");
  if (!nick) return null;
  const user = takeUntil(word, "@", nick.next);
  if (!user) return null;
  return { kind: "user", nick: nick.word, user: user.word, host: word.slice(user.next) };
};

export const decodePrefixAt = (line: string, from: number): StageResult<IrcPrefix | undefined> => {
  if (!line.startsWith(PREFIX_MARKER, from)) {
    return { ok: true, value: undefined, next: from };
  }

  const scanned = takeWord(line, from + PREFIX_MARKER.length);
  if (!scanned || scanned.word.includes(TERMINATOR)) {
    return { ok: false, error: malformed("Prefix is not followed by a space", line, from) };
  }

  return {
    ok: true,
    value: parseUserIdentity(scanned.word) ?? { kind: "server", name: scanned.word },
    next: scanned.next
  };
};

export const decodePrefix = (input: string): PrefixResult => {
  const result = decodePrefixAt(input, 0);
  if (!result.ok) return result;
  return { ok: true, prefix: result.value, rest: input.slice(result.next) };
};
