import type { IrcCommand, IrcMessage, IrcPrefix } from "./types";

export const formatPrefix = (prefix: IrcPrefix) =>
  prefix.kind === "user" ? `${prefix.nick}!${prefix.user}@${prefix.host}` : prefix.name;

export const formatCommand = (command: IrcCommand) =>
  command.kind === "numeric" ? String(command.code) : command.name;

// Close to the wire format, but the trailing ":" is not restored, so a multi-word
// last parameter does not reparse to the same message.
export const formatMessage = (message: IrcMessage) => {
  let line = message.prefix ? `:${formatPrefix(message.prefix)} ` : "";
  line += `${formatCommand(message.command)} `;
  message.params.forEach((param) => {
    line += `${param} `;
  });
  return line;
};

export const toWhitespaceSeparated = (message: IrcMessage) => {
  const prefix = message.prefix ? formatPrefix(message.prefix) : "";
  return `${formatCommand(message.command)} ${prefix} ${message.params.join(" ")}`;
};
