export type DecodeErrorKind = "incomplete" | "malformed";

const FRAGMENT_LENGTH = 32;

export class DecodeError extends Error {
  readonly kind: DecodeErrorKind;
  readonly description: string;
  readonly offset: number;
  readonly fragment: string;

  constructor(kind: DecodeErrorKind, description: string, offset: number, fragment: string) {
    super(`${description} at offset ${offset}: ${JSON.stringify(fragment)}`);
    this.name = "DecodeError";
    this.kind = kind;
    this.description = description;
    this.offset = offset;
    this.fragment = fragment;
  }
}

// Offsets count UTF-16 code units; the fragment is cut on code points so no surrogate pair is split.
const fragmentAt = (line: string, offset: number) =>
  Array.from(line.slice(offset, offset + FRAGMENT_LENGTH * 2))
    .slice(0, FRAGMENT_LENGTH)
    .join("");

// The terminator never showed up; the caller may retry once more bytes arrive.
export const incomplete = (description: string, line: string, offset: number) =>
  new DecodeError("incomplete", description, offset, fragmentAt(line, offset));

export const malformed = (description: string, line: string, offset: number) =>
  new DecodeError("malformed", description, offset, fragmentAt(line, offset));

export const isIncomplete = (error: unknown): error is DecodeError =>
  error instanceof DecodeError && error.kind === "incomplete";
