import { describe, it, expect } from "vitest";
import { getTokenPrecedence } from "../src/precedence";

describe("getTokenPrecedence", () => {
  it("looks up the fixed table", () => {
    expect(getTokenPrecedence({ type: "char", value: "<" })).toBe(10);
    expect(getTokenPrecedence({ type: "char", value: "+" })).toBe(20);
    expect(getTokenPrecedence({ type: "char", value: "-" })).toBe(30);
    expect(getTokenPrecedence({ type: "char", value: "*" })).toBe(40);
  });

  it("returns -1 for anything that is not a binary operator", () => {
    expect(getTokenPrecedence({ type: "char", value: "/" })).toBe(-1);
    expect(getTokenPrecedence({ type: "char", value: "(" })).toBe(-1);
    expect(getTokenPrecedence({ type: "number", value: 40 })).toBe(-1);
    expect(getTokenPrecedence({ type: "identifier", value: "x" })).toBe(-1);
    expect(getTokenPrecedence({ type: "eof" })).toBe(-1);
  });
});
