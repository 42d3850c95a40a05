export type Scan = {
  word: string;
  next: number;
};

export const SPACE = " ";
export const TERMINATOR = "\r";

export const takeUntil = (input: string, delimiter: string, from = 0): Scan | null => {
  const index = input.indexOf(delimiter, from);
  if (index === -1) return null;
  return { word: input.slice(from, index), next: index + delimiter.length };
};

export const takeWord = (input: string, from = 0) => takeUntil(input, SPACE, from);

// Unicode White_Space; U+FEFF is not part of it.
const WHITESPACE = /[\t\n\v\f\r \u0085\u00a0\u1680\u2000-\u200a\u2028\u2029\u202f\u205f\u3000]+/;

export const splitWhitespace = (text: string) => text.split(WHITESPACE).filter(Boolean);
