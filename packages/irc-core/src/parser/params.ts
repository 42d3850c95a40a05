import { incomplete } from "../errors";
import type { StageResult } from "../types";
import { TERMINATOR, splitWhitespace, takeUntil } from "./scanner";

export const TRAILING_MARKER = ":";

export const splitParams = (region: string): string[] => {
  const middle = takeUntil(region, TRAILING_MARKER);
  if (!middle) return splitWhitespace(region);
  return [...splitWhitespace(middle.word), region.slice(middle.next)];
};

export const decodeParamsAt = (line: string, from: number): StageResult<string[]> => {
  const region = takeUntil(line, TERMINATOR, from);
  if (!region) {
    return { ok: false, error: incomplete("Line terminator not found", line, from) };
  }
  return { ok: true, value: splitParams(region.word), next: region.next };
};
