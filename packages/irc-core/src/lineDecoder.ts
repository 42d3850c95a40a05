import EventEmitter from "eventemitter3";
import type { DecodeError } from "./errors";
import { decodeMessage } from "./parser/message";
import type { DecodeResult, IrcLine, IrcMessage } from "./types";

export type IrcLineDecoderOptions = {
  logger?: (message: string) => void;
};

type MessageHandler = (message: IrcMessage) => void;
type ErrorHandler = (error: DecodeError, line: IrcLine) => void;

type IrcLineDecoderEvents = {
  message: MessageHandler;
  error: ErrorHandler;
};

export class IrcLineDecoder {
  private emitter = new EventEmitter<IrcLineDecoderEvents>();
  private readonly logger?: (message: string) => void;

  constructor(options: IrcLineDecoderOptions = {}) {
    this.logger = options.logger;
  }

  onMessage(handler: MessageHandler) {
    this.emitter.on("message", handler);
  }

  offMessage(handler: MessageHandler) {
    this.emitter.off("message", handler);
  }

  onError(handler: ErrorHandler) {
    this.emitter.on("error", handler);
  }

  offError(handler: ErrorHandler) {
    this.emitter.off("error", handler);
  }

  push(line: IrcLine): DecodeResult {
    const result = decodeMessage(line);
    if (result.ok) {
      this.emitter.emit("message", result.message);
      return result;
    }
    this.logger?.(`Dropped IRC line (${result.error.kind}): ${result.error.message}`);
    this.emitter.emit("error", result.error, line);
    return result;
  }
}
