export type ExprNode = NumberNode | VariableNode | BinaryNode | CallNode;

export type AstNode = ExprNode | PrototypeNode | FunctionNode;

export type NumberNode = {
  type: "number";
  value: number;
};

/** A bare name reference. Nothing resolves it at parse time */
export type VariableNode = {
  type: "variable";
  name: string;
};

export type BinaryNode = {
  type: "binary";
  operator: string;
  left: ExprNode;
  right: ExprNode;
};

export type CallNode = {
  type: "call";
  callee: string;
  args: ExprNode[];
};

/** A function's name and parameter names. Duplicate parameter names are not rejected */
export type PrototypeNode = {
  type: "prototype";
  name: string;
  params: string[];
};

/** A def, or an anonymous wrapper (empty name, no params) around a top-level expression */
export type FunctionNode = {
  type: "function";
  prototype: PrototypeNode;
  body: ExprNode;
};
