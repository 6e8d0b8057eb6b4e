/**
 * JavaScript 表达式优先级
 * 数值越大结合越紧；没有优先级的表达式（标识符、字面量、调用、成员访问等）视为最高
 */

import type * as t from "@babel/types";

export const ASSIGNMENT_PRECEDENCE = 2;
const CONDITIONAL_PRECEDENCE = 3;
const RELATIONAL_PRECEDENCE = 10;
const UNARY_PRECEDENCE = 15;
const UPDATE_PRECEDENCE = 16;
const CALL_PRECEDENCE = 17;

const BINARY_PRECEDENCE: Record<string, number> = {
  "??": 4,
  "||": 4,
  "&&": 5,
  "|": 6,
  "^": 7,
  "&": 8,
  "==": 9,
  "!=": 9,
  "===": 9,
  "!==": 9,
  "<": RELATIONAL_PRECEDENCE,
  ">": RELATIONAL_PRECEDENCE,
  "<=": RELATIONAL_PRECEDENCE,
  ">=": RELATIONAL_PRECEDENCE,
  instanceof: RELATIONAL_PRECEDENCE,
  in: RELATIONAL_PRECEDENCE,
  "<<": 11,
  ">>": 11,
  ">>>": 11,
  "+": 12,
  "-": 12,
  "*": 13,
  "/": 13,
  "%": 13,
  "**": 14,
};

/**
 * 表达式自身的优先级
 */
export function expressionPrecedence(node: t.Node): number | undefined {
  switch (node.type) {
    case "SequenceExpression":
      return 1;
    case "AssignmentExpression":
    case "ArrowFunctionExpression":
    case "YieldExpression":
      return ASSIGNMENT_PRECEDENCE;
    case "ConditionalExpression":
      return CONDITIONAL_PRECEDENCE;
    case "BinaryExpression":
    case "LogicalExpression":
      return BINARY_PRECEDENCE[node.operator];
    case "TSAsExpression":
    case "TSSatisfiesExpression":
      return RELATIONAL_PRECEDENCE;
    case "UnaryExpression":
    case "AwaitExpression":
      return UNARY_PRECEDENCE;
    case "UpdateExpression":
      return UPDATE_PRECEDENCE;
    default:
      return undefined;
  }
}

/**
 * parent[key] 位置上的表达式至少需要的优先级，0 表示没有要求
 */
export function operandPrecedence(parent: t.Node, key: string): number {
  switch (parent.type) {
    case "BinaryExpression":
    case "LogicalExpression": {
      const precedence = BINARY_PRECEDENCE[parent.operator] ?? 0;
      // ** 右结合
      const rightAssociative = parent.operator === "**";
      if (key === "left") return rightAssociative ? precedence + 1 : precedence;
      if (key === "right") return rightAssociative ? precedence : precedence + 1;
      return 0;
    }
    case "UnaryExpression":
    case "AwaitExpression":
      return key === "argument" ? UNARY_PRECEDENCE : 0;
    case "UpdateExpression":
      return key === "argument" ? UPDATE_PRECEDENCE : 0;
    case "MemberExpression":
    case "OptionalMemberExpression":
      return key === "object" ? CALL_PRECEDENCE : 0;
    case "CallExpression":
    case "OptionalCallExpression":
    case "NewExpression":
      return key === "callee" ? CALL_PRECEDENCE : 0;
    case "TaggedTemplateExpression":
      return key === "tag" ? CALL_PRECEDENCE : 0;
    case "ConditionalExpression":
      return key === "test" ? CONDITIONAL_PRECEDENCE + 1 : ASSIGNMENT_PRECEDENCE;
    case "AssignmentExpression":
      return key === "right" ? ASSIGNMENT_PRECEDENCE : 0;
    case "VariableDeclarator":
      return key === "init" ? ASSIGNMENT_PRECEDENCE : 0;
    case "SpreadElement":
      return key === "argument" ? ASSIGNMENT_PRECEDENCE : 0;
    case "TSAsExpression":
    case "TSSatisfiesExpression":
      return key === "expression" ? RELATIONAL_PRECEDENCE : 0;
    default:
      return 0;
  }
}

/**
 * 源码中已带括号的表达式不再需要额外括号
 */
export function isParenthesized(node: t.Node): boolean {
  return node.extra?.parenthesized === true;
}
