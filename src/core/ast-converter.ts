/**
 * Babel AST -> 通用节点外壳
 *
 * 复合节点的每个字符都由某个子节点覆盖：子节点之间的标点、关键字和空白
 * 被记录为带原始区间的 Gap token，打印时直接从缓冲区提升。
 */

import * as t from "@babel/types";
import type { SourceBuffer } from "./buffer";
import type { ListKind, SyntaxNode } from "./node";
import {
  createComposite,
  createEllipsisRef,
  createList,
  createMetavarRef,
  createToken,
} from "./node";
import { ASSIGNMENT_PRECEDENCE, expressionPrecedence, isParenthesized, operandPrecedence } from "./precedence";
import type { Range } from "./range";
import { createRange } from "./range";

export const GAP_TOKEN_TYPE = "Gap";

export const METAVARIABLE_REGEX = /^\$([A-Z_][A-Z0-9_]*)$/;
export const MASKED_ELLIPSIS_REGEX = /^\$___([A-Z_][A-Z0-9_]*)$/;

const LIST_KEY_KINDS: Record<string, ListKind> = {
  arguments: "arguments",
  params: "parameters",
  elements: "elements",
  properties: "properties",
  expressions: "expressions",
  declarations: "declarations",
  specifiers: "specifiers",
  body: "statements",
  directives: "statements",
  consequent: "statements",
  members: "members",
};

// 这些节点的数组子节点互相穿插，按源码顺序直接展开
const INTERLEAVED_NODE_TYPES = new Set([
  "TemplateLiteral",
  "TSTemplateLiteralType",
  "JSXElement",
  "JSXFragment",
  "JSXOpeningElement",
]);

export interface ConvertContext {
  buffer: SourceBuffer;
  /** 是否识别 $X / $...X 占位符（仅 fix 模板） */
  placeholders: boolean;
  /** 被遮蔽的 $...X 的起始偏移 */
  ellipsisOffsets: ReadonlySet<number>;
}

type PositionedNode = SyntaxNode & { readonly origin: Range };

function isBabelNode(value: unknown): value is t.Node {
  return (
    typeof value === "object" &&
    value !== null &&
    typeof Reflect.get(value, "type") === "string" &&
    typeof Reflect.get(value, "start") === "number"
  );
}

function nodeRange(node: t.Node, ctx: ConvertContext): Range {
  if (node.start == null || node.end == null) {
    throw new Error(`${node.type} 节点缺少位置信息`);
  }
  return createRange(ctx.buffer, node.start, node.end);
}

function hasOrigin(node: SyntaxNode): node is PositionedNode {
  return node.origin !== null;
}

function listKindFor(node: t.Node, key: string): ListKind | undefined {
  if (INTERLEAVED_NODE_TYPES.has(node.type)) return undefined;
  if (key === "body" && (t.isClassBody(node) || t.isTSInterfaceBody(node))) {
    return "members";
  }
  if (key === "members" && t.isTSEnumDeclaration(node)) {
    return "properties";
  }
  return LIST_KEY_KINDS[key];
}

/**
 * 识别占位符引用
 * slot 为该位置要求的最低表达式优先级
 */
function placeholderRef(
  node: t.Node,
  ctx: ConvertContext,
  slot: number
): SyntaxNode | null {
  if (t.isExpressionStatement(node) && t.isIdentifier(node.expression)) {
    // 语句列表中单独一行的 $...X 整体作为引用（包括结尾的分号）
    const statementEllipsis = ellipsisName(node.expression, ctx);
    if (statementEllipsis) {
      return createEllipsisRef(statementEllipsis, nodeRange(node, ctx));
    }
  }

  if (!t.isIdentifier(node)) return null;

  const own = nodeRange(node, ctx);
  // 带类型注解或可选标记时，标识符的区间包含 ": T" 和 "?"，引用只覆盖名字本身
  const nameRange = createRange(ctx.buffer, own.start, own.start + node.name.length);

  const ellipsis = ellipsisName(node, ctx);
  const metavar = METAVARIABLE_REGEX.exec(node.name);
  let ref: SyntaxNode;
  if (ellipsis) {
    ref = createEllipsisRef(ellipsis, nameRange);
  } else if (metavar) {
    ref = createMetavarRef(metavar[1], nameRange, slot);
  } else {
    return null;
  }
  if (own.end === nameRange.end) return ref;

  const children: PositionedNode[] = hasOrigin(ref) ? [ref] : [];
  if (node.typeAnnotation) {
    const annotation = convertNode(node.typeAnnotation, ctx);
    if (hasOrigin(annotation)) children.push(annotation);
  }
  return createComposite(
    "expr",
    node.type,
    fillGaps(children, own.start, own.end, ctx),
    own
  );
}

export function ellipsisName(
  node: t.Identifier,
  ctx: ConvertContext
): string | null {
  if (node.start == null || !ctx.ellipsisOffsets.has(node.start)) return null;
  const match = MASKED_ELLIPSIS_REGEX.exec(node.name);
  return match ? match[1] : null;
}

/**
 * 在子节点之间补齐 Gap token，返回覆盖 [start, end) 的子节点序列
 */
function fillGaps(
  children: readonly PositionedNode[],
  start: number,
  end: number,
  ctx: ConvertContext
): SyntaxNode[] {
  const result: SyntaxNode[] = [];
  let cursor = start;

  for (const child of children) {
    // 已被前一个子节点覆盖（如简写属性 { a }、带默认值的 { a = 1 } 中的 key）
    if (child.origin.start < cursor) continue;
    if (child.origin.start > cursor) {
      result.push(
        createToken(GAP_TOKEN_TYPE, createRange(ctx.buffer, cursor, child.origin.start))
      );
    }
    result.push(child);
    cursor = child.origin.end;
  }

  if (cursor < end) {
    result.push(createToken(GAP_TOKEN_TYPE, createRange(ctx.buffer, cursor, end)));
  }
  return result;
}

// 起点相同时较长的节点在前，被它覆盖的节点随后被跳过
function byStart(a: PositionedNode, b: PositionedNode): number {
  return a.origin.start - b.origin.start || b.origin.end - a.origin.end;
}

/**
 * 由一组 Babel 节点构造列表节点，空列表没有原始区间
 */
export function convertList(
  listKind: ListKind,
  nodes: readonly t.Node[],
  ctx: ConvertContext
): SyntaxNode {
  const slot =
    listKind === "arguments" || listKind === "elements" ? ASSIGNMENT_PRECEDENCE : 0;
  const items = nodes
    .map((node) => convertNode(node, ctx, isParenthesized(node) ? 0 : slot))
    .filter(hasOrigin)
    .sort(byStart);

  if (items.length === 0) {
    return createList(listKind, [], null);
  }

  const start = items[0].origin.start;
  const end = Math.max(...items.map((item) => item.origin.end));
  return createList(
    listKind,
    fillGaps(items, start, end, ctx),
    createRange(ctx.buffer, start, end)
  );
}

export function convertNode(
  node: t.Node,
  ctx: ConvertContext,
  slot = 0
): SyntaxNode {
  if (ctx.placeholders) {
    const ref = placeholderRef(node, ctx, slot);
    if (ref) return ref;
  }

  const own = nodeRange(node, ctx);
  const children: PositionedNode[] = [];
  const groups = new Map<ListKind, t.Node[]>();

  for (const key of t.VISITOR_KEYS[node.type] ?? []) {
    const value: unknown = Reflect.get(node, key);

    if (isBabelNode(value)) {
      const child = convertNode(
        value,
        ctx,
        isParenthesized(value) ? 0 : operandPrecedence(node, key)
      );
      if (hasOrigin(child)) children.push(child);
    } else if (Array.isArray(value)) {
      const elements = value.filter(isBabelNode);
      const listKind = listKindFor(node, key);
      if (listKind) {
        groups.set(listKind, [...(groups.get(listKind) ?? []), ...elements]);
      } else {
        for (const element of elements) {
          const child = convertNode(element, ctx);
          if (hasOrigin(child)) children.push(child);
        }
      }
    }
  }

  for (const [listKind, elements] of groups) {
    const list = convertList(listKind, elements, ctx);
    if (hasOrigin(list)) children.push(list);
  }

  if (children.length === 0) {
    return createToken(node.type, own);
  }

  children.sort(byStart);
  const start = Math.min(own.start, children[0].origin.start);
  const end = Math.max(own.end, ...children.map((child) => child.origin.end));
  const kind = t.isStatement(node) || t.isProgram(node) ? "stmt" : "expr";

  return createComposite(
    kind,
    node.type,
    fillGaps(children, start, end, ctx),
    createRange(ctx.buffer, start, end),
    kind === "expr" ? expressionPrecedence(node) : undefined
  );
}
