import { formatError, ParseError } from "./errors";
import { isCharToken, Parser } from "./parser";
import { isOk, Result } from "./result";
import { FunctionNode, PrototypeNode } from "./types";

export type TopLevelOutcome =
  | { type: "definition"; node: FunctionNode }
  | { type: "extern"; node: PrototypeNode }
  | { type: "expression"; node: FunctionNode }
  /** A bare ; between statements */
  | { type: "empty" }
  | { type: "error"; error: ParseError };

export interface Reporter {
  /** Called before each top-level statement is read */
  prompt(): void;
  report(outcome: TopLevelOutcome): void;
}

export type DriveSummary = {
  definitions: number;
  externs: number;
  expressions: number;
  errors: number;
};

/**
 * top ::= definition | external | expression | ';'
 *
 * Parses one top-level statement, or returns undefined at the end of input. After a syntax
 * error one token is skipped and parsing resumes there, which can produce further errors.
 */
export const handleTopLevel = (parser: Parser): TopLevelOutcome | undefined => {
  const token = parser.peek();

  if (token.type === "eof") return undefined;

  if (isCharToken(token, ";")) {
    parser.advance();
    return { type: "empty" };
  }

  if (token.type === "keyword" && token.value === "def") {
    return recover(parser, parser.parseDefinition(), (node) => ({ type: "definition", node }));
  }

  if (token.type === "keyword" && token.value === "extern") {
    return recover(parser, parser.parseExtern(), (node) => ({ type: "extern", node }));
  }

  return recover(parser, parser.parseTopLevelExpr(), (node) => ({ type: "expression", node }));
};

const recover = <T>(
  parser: Parser,
  result: Result<T>,
  toOutcome: (node: T) => TopLevelOutcome
): TopLevelOutcome => {
  if (isOk(result)) return toOutcome(result.value);

  parser.advance();
  return { type: "error", error: result.error };
};

/** Runs handleTopLevel until the input is exhausted */
export const drive = (parser: Parser, reporter: Reporter): DriveSummary => {
  const summary: DriveSummary = { definitions: 0, externs: 0, expressions: 0, errors: 0 };

  while (true) {
    reporter.prompt();

    const outcome = handleTopLevel(parser);
    if (!outcome) return summary;

    tally(summary, outcome);
    reporter.report(outcome);
  }
};

const tally = (summary: DriveSummary, outcome: TopLevelOutcome) => {
  if (outcome.type === "definition") summary.definitions++;
  if (outcome.type === "extern") summary.externs++;
  if (outcome.type === "expression") summary.expressions++;
  if (outcome.type === "error") summary.errors++;
};

/** The line a read loop prints for outcome, if any */
export const describeOutcome = (outcome: TopLevelOutcome): string | undefined => {
  switch (outcome.type) {
    case "definition":
      return "Parsed a function definition.";
    case "extern":
      return "Parsed an extern.";
    case "expression":
      return "Parsed a top-level expr.";
    case "error":
      return formatError(outcome.error);
    case "empty":
      return undefined;
  }
};
