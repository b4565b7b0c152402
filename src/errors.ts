/** The only error the parser reports. Every one of them is recoverable by skipping a token */
export type ParseError = { type: "syntax"; message: string };

export const syntaxError = (message: string): ParseError => ({ type: "syntax", message });

export const formatError = (error: ParseError): string => `Error: ${error.message}`;

export const messages = {
  expectedExpression: "Unknown token: expected an expression",
  expectedCloseParen: "expected ')'",
  expectedArgumentSeparator: "expected ')' or ',' in argument list",
  expectedFunctionName: "expected function name in prototype",
  expectedPrototypeOpenParen: "expected '(' in prototype",
  expectedPrototypeCloseParen: "expected ')' in prototype",
} as const;
