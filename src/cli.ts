import { closeSync, openSync } from "fs";
import { describeOutcome, drive, TopLevelOutcome } from "./driver";
import { Lexer, readTokens } from "./lexer";
import { Parser } from "./parser";
import { CharSource, fileSource } from "./source";

const STDIN = 0;

export const usage = "usage: expr-front [file | -] [--tokens] [--ast] [--quiet]";

export type CliOptions = {
  /** Read from stdin when absent */
  file?: string;
  /** Print the token stream as JSON instead of parsing */
  tokens: boolean;
  /** Print each parsed node as JSON */
  ast: boolean;
  /** Leave out the "> " prompts */
  quiet: boolean;
};

export interface CliIo {
  stdout(text: string): void;
  stderr(text: string): void;
}

export const consoleIo: CliIo = {
  stdout: (text) => process.stdout.write(text),
  stderr: (text) => process.stderr.write(text),
};

export const parseArgs = (args: string[]): CliOptions => {
  const options: CliOptions = { tokens: false, ast: false, quiet: false };

  for (const arg of args) {
    if (arg === "--tokens") options.tokens = true;
    else if (arg === "--ast") options.ast = true;
    else if (arg === "--quiet") options.quiet = true;
    else if (arg.startsWith("--")) throw new Error(`Unknown option ${arg}\n${usage}`);
    else if (options.file !== undefined) throw new Error(`Unexpected argument ${arg}\n${usage}`);
    else if (arg !== "-") options.file = arg;
  }

  return options;
};

/** Returns the process exit code: 0, or 1 when any syntax error was reported */
export const run = (source: CharSource, options: CliOptions, io: CliIo): number => {
  const lexer = new Lexer(source);

  if (options.tokens) {
    io.stdout(`${JSON.stringify(readTokens(lexer), undefined, 2)}\n`);
    return 0;
  }

  const summary = drive(new Parser(lexer), {
    prompt: () => {
      if (!options.quiet) io.stderr("> ");
    },
    report: (outcome) => {
      const line = describeOutcome(outcome);
      if (line) io.stderr(`${line}\n`);

      const node = outcomeNode(outcome);
      if (options.ast && node) io.stdout(`${JSON.stringify(node, undefined, 2)}\n`);
    },
  });

  return summary.errors ? 1 : 0;
};

const outcomeNode = (outcome: TopLevelOutcome) => ("node" in outcome ? outcome.node : undefined);

/** Exit code 2 means the arguments or the input file could not be used */
export const main = (argv: string[], io: CliIo): number => {
  try {
    const options = parseArgs(argv);
    const fd = options.file === undefined ? STDIN : openSync(options.file, "r");

    try {
      return run(fileSource(fd), options, io);
    } finally {
      if (fd !== STDIN) closeSync(fd);
    }
  } catch (error) {
    io.stderr(`${error instanceof Error ? error.message : String(error)}\n`);
    return 2;
  }
};
