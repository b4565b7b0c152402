export const keywords = ["def", "extern"] as const;

export type Keyword = typeof keywords[number];

export type Token = EofToken | KeywordToken | IdentifierToken | NumberToken | CharToken;

/** Marks the end of the character stream. The lexer keeps returning it once reached */
export type EofToken = { type: "eof" };

/** One of the reserved words, def or extern */
export type KeywordToken = { type: "keyword"; value: Keyword };

/** An ascii letter followed by any number of ascii letters or digits. Underscores are not part of an identifier */
export type IdentifierToken = { type: "identifier"; value: string };

/** Every number is a double. The lexer does not reject malformed literals such as 1.2.3 */
export type NumberToken = { type: "number"; value: number };

/** Any other single character, operators and punctuation included, kept verbatim */
export type CharToken = { type: "char"; value: string };
