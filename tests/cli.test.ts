import { mkdtempSync, rmSync, writeFileSync } from "fs";
import { tmpdir } from "os";
import { join } from "path";
import { afterEach, beforeEach, describe, it, expect } from "vitest";
import { CliIo, CliOptions, main, parseArgs, run } from "../src/cli";
import { stringSource } from "../src/source";

const captureIo = () => {
  const out: string[] = [];
  const errOut: string[] = [];
  const io: CliIo = {
    stdout: (text) => out.push(text),
    stderr: (text) => errOut.push(text),
  };
  return { io, stdout: () => out.join(""), stderr: () => errOut.join("") };
};

const defaults: CliOptions = { tokens: false, ast: false, quiet: false };

describe("parseArgs", () => {
  it("reads stdin by default", () => {
    expect(parseArgs([])).toEqual(defaults);
    expect(parseArgs(["-"])).toEqual(defaults);
  });

  it("takes a file and flags in any order", () => {
    expect(parseArgs(["--ast", "input.txt", "--quiet"])).toEqual({
      file: "input.txt",
      tokens: false,
      ast: true,
      quiet: true,
    });
  });

  it("rejects unknown options", () => {
    expect(() => parseArgs(["--eval"])).toThrow("Unknown option --eval");
  });

  it("rejects a second file", () => {
    expect(() => parseArgs(["a.txt", "b.txt"])).toThrow("Unexpected argument b.txt");
  });
});

describe("run", () => {
  it("prints prompts and report lines to stderr", () => {
    const { io, stdout, stderr } = captureIo();

    const code = run(stringSource("def f(x) x*2\n"), defaults, io);

    expect(code).toBe(0);
    expect(stderr()).toBe("> Parsed a function definition.\n> ");
    expect(stdout()).toBe("");
  });

  it("exits with 1 after a syntax error", () => {
    const { io, stderr } = captureIo();

    const code = run(stringSource("foo(1,"), { ...defaults, quiet: true }, io);

    expect(code).toBe(1);
    expect(stderr()).toBe("Error: Unknown token: expected an expression\n");
  });

  it("keeps going after an error", () => {
    const { io, stderr } = captureIo();

    run(stringSource("(1; extern sin(x)"), { ...defaults, quiet: true }, io);

    expect(stderr()).toBe("Error: expected ')'\nParsed an extern.\n");
  });

  it("prints parsed nodes as JSON with --ast", () => {
    const { io, stdout } = captureIo();

    run(stringSource("extern sin(x)"), { ...defaults, ast: true, quiet: true }, io);

    expect(JSON.parse(stdout())).toEqual({ type: "prototype", name: "sin", params: ["x"] });
  });

  it("prints the token stream with --tokens", () => {
    const { io, stdout, stderr } = captureIo();

    const code = run(stringSource("a+1"), { ...defaults, tokens: true }, io);

    expect(code).toBe(0);
    expect(JSON.parse(stdout())).toEqual([
      { type: "identifier", value: "a" },
      { type: "char", value: "+" },
      { type: "number", value: 1 },
      { type: "eof" },
    ]);
    expect(stderr()).toBe("");
  });
});

describe("main", () => {
  let dir: string;

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), "expr-front-cli-"));
  });

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true });
  });

  it("parses the named file", () => {
    const path = join(dir, "input.txt");
    writeFileSync(path, "extern cos(x)\ncos(1)\n", "utf8");
    const { io, stderr } = captureIo();

    expect(main([path, "--quiet"], io)).toBe(0);
    expect(stderr()).toBe("Parsed an extern.\nParsed a top-level expr.\n");
  });

  it("exits with 2 when the file cannot be opened", () => {
    const path = join(dir, "missing.txt");
    const { io, stdout, stderr } = captureIo();

    expect(main([path], io)).toBe(2);
    expect(stderr()).toBe(`ENOENT: no such file or directory, open '${path}'\n`);
    expect(stdout()).toBe("");
  });

  it("exits with 2 on an unknown option", () => {
    const { io, stderr } = captureIo();

    expect(main(["--eval"], io)).toBe(2);
    expect(stderr()).toBe(
      "Unknown option --eval\nusage: expr-front [file | -] [--tokens] [--ast] [--quiet]\n"
    );
  });
});
