import { Token } from "./types";

/** Higher binds tighter. The table is fixed, and - outranks + */
export const binaryPrecedence: ReadonlyMap<string, number> = new Map([
  ["<", 10],
  ["+", 20],
  ["-", 30],
  ["*", 40],
]);

/** Precedence of token as a binary operator, or -1 when it is not one */
export const getTokenPrecedence = (token: Token): number => {
  if (token.type !== "char") return -1;

  const precedence = binaryPrecedence.get(token.value) ?? 0;
  return precedence > 0 ? precedence : -1;
};
