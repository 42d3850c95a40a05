import { malformed } from "../errors";
import type { DecodeResult, IrcLine, IrcMessage } from "../types";
import { decodeCommandAt } from "./command";
import { decodeParamsAt } from "./params";
import { decodePrefixAt } from "./prefix";

const utf8 = new TextDecoder("utf-8", { fatal: true, ignoreBOM: true });

const toText = (line: IrcLine): string | null => {
  if (typeof line === "string") return line;
  try {
    return utf8.decode(line);
  } catch {
    return null;
  }
};

export const decodeMessage = (line: IrcLine): DecodeResult => {
  const text = toText(line);
  if (text === null) {
    return { ok: false, error: malformed("Line is not valid UTF-8", "", 0) };
  }

  const prefix = decodePrefixAt(text, 0);
  if (!prefix.ok) return prefix;

  const command = decodeCommandAt(text, prefix.next);
  if (!command.ok) return command;

  const params = decodeParamsAt(text, command.next);
  if (!params.ok) return params;

  const message: IrcMessage = { command: command.value, params: params.value };
  if (prefix.value) message.prefix = prefix.value;
  return { ok: true, message };
};

export const parseIrcMessage = (line: IrcLine): IrcMessage => {
  const result = decodeMessage(line);
  if (!result.ok) throw result.error;
  return result.message;
};
