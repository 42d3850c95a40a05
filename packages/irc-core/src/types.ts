import type { DecodeError } from "./errors";

export type IrcPrefix =
  | { kind: "server"; name: string }
  | { kind: "user"; nick: string; user: string; host: string };

export type IrcCommand = { kind: "named"; name: string } | { kind: "numeric"; code: number };

export type IrcMessage = {
  prefix?: IrcPrefix;
  command: IrcCommand;
  params: string[];
};

// One already-delimited line, terminated by "\r". Bytes must be UTF-8.
export type IrcLine = string | Uint8Array;

export type DecodeResult = { ok: true; message: IrcMessage } | { ok: false; error: DecodeError };

// Outcome of a single decoding stage: a value plus the index where the next stage starts.
export type StageResult<T> = { ok: true; value: T; next: number } | { ok: false; error: DecodeError };
