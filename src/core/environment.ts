/**
 * 匹配环境构造工具
 * 匹配器是外部协作方，这里只提供由节点或偏移区间构造绑定的辅助方法
 */

import { findNodeByRange } from "./ast-parser";
import { invalidRange } from "./error-handler";
import type { SyntaxNode } from "./node";
import type { Binding, MatchEnvironment, ParsedTree } from "./types";

export type RangeTuple = readonly [start: number, end: number];

export function bindNode(node: SyntaxNode): Binding {
  return { kind: "node", node };
}

export function bindSequence(nodes: readonly SyntaxNode[]): Binding {
  return { kind: "sequence", nodes };
}

/**
 * 去掉 $ / $... 前缀，得到环境中的元变量名
 */
export function normalizeMetavariableName(name: string): string {
  return name.replace(/^\$(\.\.\.)?/, "");
}

export function createEnvironment(
  entries: Iterable<readonly [string, Binding]>
): MatchEnvironment {
  const environment = new Map<string, Binding>();
  for (const [name, binding] of entries) {
    environment.set(normalizeMetavariableName(name), binding);
  }
  return environment;
}

function nodeAt(tree: ParsedTree, [start, end]: RangeTuple): SyntaxNode {
  const node = findNodeByRange(tree.root, start, end);
  if (!node) {
    throw invalidRange(`目标文件 ${tree.buffer.id} 中没有区间恰好为 [${start}, ${end}) 的节点`);
  }
  return node;
}

/**
 * 按偏移区间从目标语法树中取出子树构造匹配环境
 * 单个区间对应普通元变量，区间数组对应省略号元变量
 */
export function environmentFromRanges(
  tree: ParsedTree,
  bindings: Record<string, RangeTuple | readonly RangeTuple[]>
): MatchEnvironment {
  return createEnvironment(
    Object.entries(bindings).map(([name, spec]): [string, Binding] => {
      if (isRangeTuple(spec)) {
        return [name, bindNode(nodeAt(tree, spec))];
      }
      return [name, bindSequence(spec.map((range) => nodeAt(tree, range)))];
    })
  );
}

function isRangeTuple(
  spec: RangeTuple | readonly RangeTuple[]
): spec is RangeTuple {
  return spec.length === 2 && typeof spec[0] === "number";
}
