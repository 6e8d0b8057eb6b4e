/**
 * 结构化打印器
 * 逐节点选择：原文提升 > 封闭集合连接符合成 > 递归拼接子节点；
 * 其余情况一律报 UnprintableNode，不猜测、不编造语义文本。
 */

import type { SourceBuffer } from "./buffer";
import type { FixError, FixResult } from "./error-handler";
import { createFixError, fail, offsetUnitMismatch, ok } from "./error-handler";
import type { SubstitutedNode } from "./node";
import { SYNTHETIC_TOKEN_TEXT } from "./node";
import { sliceBuffer } from "./range";
import type { PrintedSegment } from "./types";

interface PrintContext {
  target: SourceBuffer;
  template: SourceBuffer;
  segments: PrintedSegment[];
}

function unprintable(detail: string): FixError {
  return createFixError("PRINT001", [detail]);
}

function describe(node: SubstitutedNode): string {
  switch (node.kind) {
    case "metavar":
      return `未解析的元变量引用 $${node.name}`;
    case "ellipsis":
      return `未解析的省略号引用 $...${node.name}`;
    case "expanded":
      return `省略号展开 $...${node.name}`;
    case "list":
      return `列表 ${node.listKind}`;
    default:
      return node.type;
  }
}

function isAltered(node: SubstitutedNode): boolean {
  return (
    (node.kind === "expr" || node.kind === "stmt" || node.kind === "list") &&
    node.altered === true
  );
}

/**
 * 从原始区间所在的缓冲区提升文本
 */
function lift(node: SubstitutedNode, ctx: PrintContext): FixError | null {
  const origin = node.origin;
  if (!origin) return unprintable(describe(node));

  if (origin.bufferId === ctx.target.id) {
    ctx.segments.push({ source: "target", text: sliceBuffer(ctx.target, origin) });
    return null;
  }
  if (origin.bufferId === ctx.template.id) {
    ctx.segments.push({ source: "template", text: sliceBuffer(ctx.template, origin) });
    return null;
  }
  return unprintable(`${describe(node)} 的原始区间属于未知缓冲区 ${origin.bufferId}`);
}

function printChildren(
  children: readonly SubstitutedNode[],
  ctx: PrintContext
): FixError | null {
  for (const child of children) {
    const error = printNode(child, ctx);
    if (error) return error;
  }
  return null;
}

function printNode(node: SubstitutedNode, ctx: PrintContext): FixError | null {
  // 1. 带原始区间且子树未被替换：原文提升
  if (node.origin && !isAltered(node) && node.kind !== "metavar" && node.kind !== "ellipsis") {
    return lift(node, ctx);
  }

  switch (node.kind) {
    // 2. 封闭集合中的合成连接符
    case "token":
      if (!node.origin && node.synthetic) {
        ctx.segments.push({
          source: "synthetic",
          text: SYNTHETIC_TOKEN_TEXT[node.synthetic],
        });
        return null;
      }
      return unprintable(describe(node));

    // 3. 递归拼接
    case "expr":
    case "stmt":
      return printChildren(node.children, ctx);
    case "list":
      return printChildren(node.items, ctx);
    case "expanded":
      return printChildren(node.elements, ctx);

    // 4. 其余情况
    case "metavar":
    case "ellipsis":
      return unprintable(describe(node));
  }
}

/**
 * 打印并返回每段文本的来源
 */
export function printSegments(
  tree: SubstitutedNode,
  target: SourceBuffer,
  template: SourceBuffer
): FixResult<PrintedSegment[]> {
  if (target.unit !== template.unit) {
    throw offsetUnitMismatch(
      `目标文件使用 ${target.unit}，fix 模板使用 ${template.unit}`
    );
  }

  const ctx: PrintContext = { target, template, segments: [] };
  const error = printNode(tree, ctx);
  return error ? fail(error) : ok(ctx.segments);
}

/**
 * print(tree, targetBuffer, templateBuffer) -> String | Error
 */
export function printAst(
  tree: SubstitutedNode,
  target: SourceBuffer,
  template: SourceBuffer
): FixResult<string> {
  const result = printSegments(tree, target, template);
  if (!result.ok) return result;
  return ok(result.value.map((segment) => segment.text).join(""));
}

/**
 * 合成字符数（用于验证只有分隔符是合成的）
 */
export function countSyntheticCharacters(segments: readonly PrintedSegment[]): number {
  return segments
    .filter((segment) => segment.source === "synthetic")
    .reduce((total, segment) => total + segment.text.length, 0);
}
