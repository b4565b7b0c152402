import { messages, syntaxError } from "./errors";
import { Lexer } from "./lexer";
import { getTokenPrecedence } from "./precedence";
import { andThen, err, isErr, map, ok, Result } from "./result";
import { CharToken, ExprNode, FunctionNode, PrototypeNode, Token } from "./types";

/**
 * Recursive descent parser with one token of lookahead. Binary operators are parsed by
 * precedence climbing over the fixed table in ./precedence.
 *
 * Every parse method returns a Result. On failure the parser is left wherever the error was
 * found; callers resynchronize by skipping a token (see ./driver).
 *
 * Nesting (parentheses, call arguments, rising precedence) is handled by recursion, so very
 * deep inputs are bounded by the JavaScript call stack.
 */
export class Parser {
  private current?: Token;

  constructor(private readonly lexer: Lexer) {}

  /** The current token. The first call reads it from the lexer */
  peek(): Token {
    if (!this.current) this.current = this.lexer.nextToken();
    return this.current;
  }

  advance(): void {
    this.peek();
    this.current = this.lexer.nextToken();
  }

  /** primary ::= number | identifierexpr | parenexpr */
  parsePrimary(): Result<ExprNode> {
    const token = this.peek();

    if (token.type === "number") {
      this.advance();
      return ok({ type: "number", value: token.value });
    }

    if (token.type === "identifier") return this.parseIdentifierExpr();
    if (isCharToken(token, "(")) return this.parseParenExpr();
    return err(syntaxError(messages.expectedExpression));
  }

  /**
   * identifierexpr ::= identifier | identifier '(' (expression (',' expression)*)? ')'
   */
  parseIdentifierExpr(): Result<ExprNode> {
    const token = this.peek();
    if (token.type !== "identifier") return err(syntaxError(messages.expectedExpression));

    const name = token.value;
    this.advance();

    if (!this.atChar("(")) return ok({ type: "variable", name });
    this.advance();

    const args: ExprNode[] = [];
    if (!this.atChar(")")) {
      while (true) {
        const arg = this.parseExpression();
        if (isErr(arg)) return arg;
        args.push(arg.value);

        if (this.atChar(")")) break;
        if (!this.atChar(",")) return err(syntaxError(messages.expectedArgumentSeparator));
        this.advance();
      }
    }

    this.advance(); // Discard closing paren
    return ok({ type: "call", callee: name, args });
  }

  /** parenexpr ::= '(' expression ')'. The parentheses leave no node behind */
  parseParenExpr(): Result<ExprNode> {
    this.advance();

    const inner = this.parseExpression();
    if (isErr(inner)) return inner;

    if (!this.atChar(")")) return err(syntaxError(messages.expectedCloseParen));
    this.advance();
    return inner;
  }

  /**
   * Folds (operator primary)* onto left for as long as the pending operator binds at least
   * as tightly as minPrecedence. Equal precedence folds left to right; a tighter operator
   * after the right operand takes that operand first.
   */
  parseBinOpRHS(minPrecedence: number, left: ExprNode): Result<ExprNode> {
    while (true) {
      const operator = this.peek();
      const precedence = getTokenPrecedence(operator);
      if (operator.type !== "char" || precedence < minPrecedence) return ok(left);

      this.advance();
      const primary = this.parsePrimary();
      if (isErr(primary)) return primary;

      let right = primary.value;
      if (precedence < getTokenPrecedence(this.peek())) {
        const rest = this.parseBinOpRHS(precedence + 1, right);
        if (isErr(rest)) return rest;
        right = rest.value;
      }

      left = { type: "binary", operator: operator.value, left, right };
    }
  }

  /** expression ::= primary binoprhs */
  parseExpression(): Result<ExprNode> {
    return andThen(this.parsePrimary(), (primary) => this.parseBinOpRHS(0, primary));
  }

  /** prototype ::= identifier '(' identifier* ')' */
  parsePrototype(): Result<PrototypeNode> {
    const token = this.peek();
    if (token.type !== "identifier") return err(syntaxError(messages.expectedFunctionName));

    const name = token.value;
    this.advance();

    if (!this.atChar("(")) return err(syntaxError(messages.expectedPrototypeOpenParen));
    this.advance();

    const params: string[] = [];
    for (let param = this.peek(); param.type === "identifier"; param = this.peek()) {
      params.push(param.value);
      this.advance();
    }

    if (!this.atChar(")")) return err(syntaxError(messages.expectedPrototypeCloseParen));
    this.advance();

    return ok({ type: "prototype", name, params });
  }

  /** definition ::= 'def' prototype expression */
  parseDefinition(): Result<FunctionNode> {
    this.advance(); // Discard def

    const prototype = this.parsePrototype();
    if (isErr(prototype)) return prototype;

    const signature = prototype.value;
    return map(
      this.parseExpression(),
      (body): FunctionNode => ({ type: "function", prototype: signature, body })
    );
  }

  /** external ::= 'extern' prototype */
  parseExtern(): Result<PrototypeNode> {
    this.advance(); // Discard extern
    return this.parsePrototype();
  }

  /** Wraps a bare expression in an anonymous function so it looks like any other definition */
  parseTopLevelExpr(): Result<FunctionNode> {
    return map(
      this.parseExpression(),
      (body): FunctionNode => ({
        type: "function",
        prototype: { type: "prototype", name: "", params: [] },
        body,
      })
    );
  }

  private atChar(char: string): boolean {
    return isCharToken(this.peek(), char);
  }
}

export const isCharToken = (token: Token, char: string): token is CharToken =>
  token.type === "char" && token.value === char;
