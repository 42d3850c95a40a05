export * from "./types";
export * from "./errors";
export * from "./parser/scanner";
export * from "./parser/prefix";
export * from "./parser/command";
export * from "./parser/params";
export * from "./parser/message";
export * from "./format";
export * from "./lineDecoder";
