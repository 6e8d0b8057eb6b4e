/**
 * 通用节点外壳
 * 各语言保留自己的语法（type 字段），替换与打印只依赖这里的封闭变体集合
 */

import type { Range } from "./range";

/**
 * 列表种类，决定省略号展开时使用的分隔符
 */
export type ListKind =
  | "arguments"
  | "parameters"
  | "elements"
  | "properties"
  | "expressions"
  | "declarations"
  | "specifiers"
  | "statements"
  | "members";

/**
 * 可合成的连接符（封闭集合）
 */
export type SyntheticToken = "comma" | "newline" | "lparen" | "rparen";

export const SYNTHETIC_TOKEN_TEXT: Readonly<Record<SyntheticToken, string>> = {
  comma: ", ",
  newline: "\n",
  lparen: "(",
  rparen: ")",
};

export const LIST_SEPARATORS: Readonly<Record<ListKind, SyntheticToken>> = {
  arguments: "comma",
  parameters: "comma",
  elements: "comma",
  properties: "comma",
  expressions: "comma",
  declarations: "comma",
  specifiers: "comma",
  statements: "newline",
  members: "newline",
};

interface NodeBase {
  /** 原始区间；null 表示合成节点 */
  readonly origin: Range | null;
}

/**
 * 复合节点（表达式类 / 语句类）
 */
export interface CompositeNode<TChild> extends NodeBase {
  readonly kind: "expr" | "stmt";
  /** 语言相关的语法名，例如 CallExpression */
  readonly type: string;
  readonly children: readonly TChild[];
  /** 替换后子树发生变化 */
  readonly altered?: boolean;
  /** 表达式优先级，数值越大结合越紧；未设置视为不需要括号 */
  readonly precedence?: number;
}

export interface ListNode<TChild> extends NodeBase {
  readonly kind: "list";
  readonly listKind: ListKind;
  readonly items: readonly TChild[];
  readonly altered?: boolean;
}

export interface TokenNode extends NodeBase {
  readonly kind: "token";
  readonly type: string;
  readonly synthetic?: SyntheticToken;
}

/** $X */
export interface MetavarRefNode extends NodeBase {
  readonly kind: "metavar";
  readonly name: string;
  /** 所在位置要求的最低优先级，绑定的表达式低于它时需要加括号 */
  readonly minPrecedence?: number;
}

/** $...X */
export interface EllipsisRefNode extends NodeBase {
  readonly kind: "ellipsis";
  readonly name: string;
}

/**
 * 省略号绑定展开后的序列，元素之间穿插合成分隔符
 */
export interface ExpandedNode extends NodeBase {
  readonly kind: "expanded";
  readonly name: string;
  readonly listKind: ListKind;
  readonly elements: readonly SubstitutedNode[];
}

export type SyntaxNode =
  | CompositeNode<SyntaxNode>
  | ListNode<SyntaxNode>
  | TokenNode
  | MetavarRefNode
  | EllipsisRefNode;

export type SubstitutedNode =
  | CompositeNode<SubstitutedNode>
  | ListNode<SubstitutedNode>
  | TokenNode
  | MetavarRefNode
  | EllipsisRefNode
  | ExpandedNode;

export function createComposite(
  kind: "expr" | "stmt",
  type: string,
  children: readonly SyntaxNode[],
  origin: Range | null,
  precedence?: number
): CompositeNode<SyntaxNode> {
  return precedence === undefined
    ? { kind, type, children, origin }
    : { kind, type, children, origin, precedence };
}

export function createList(
  listKind: ListKind,
  items: readonly SyntaxNode[],
  origin: Range | null
): ListNode<SyntaxNode> {
  return { kind: "list", listKind, items, origin };
}

export function createToken(type: string, origin: Range): TokenNode {
  return { kind: "token", type, origin };
}

export function createSyntheticToken(synthetic: SyntheticToken): TokenNode {
  return { kind: "token", type: "Synthetic", origin: null, synthetic };
}

export function createMetavarRef(
  name: string,
  origin: Range | null,
  minPrecedence = 0
): MetavarRefNode {
  return minPrecedence > 0
    ? { kind: "metavar", name, origin, minPrecedence }
    : { kind: "metavar", name, origin };
}

export function createEllipsisRef(name: string, origin: Range | null): EllipsisRefNode {
  return { kind: "ellipsis", name, origin };
}

/**
 * 前序遍历，回调返回 false 时不再进入子节点
 */
export function walkNodes(
  node: SubstitutedNode,
  visit: (node: SubstitutedNode) => boolean | void
): void {
  if (visit(node) === false) return;
  switch (node.kind) {
    case "expr":
    case "stmt":
      node.children.forEach((child) => walkNodes(child, visit));
      break;
    case "list":
      node.items.forEach((item) => walkNodes(item, visit));
      break;
    case "expanded":
      node.elements.forEach((element) => walkNodes(element, visit));
      break;
    default:
      break;
  }
}
