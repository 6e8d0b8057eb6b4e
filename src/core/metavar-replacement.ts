/**
 * 元变量替换
 * 将 fix 模板中的 $X / $...X 引用替换为匹配环境中绑定的目标子树
 *
 * - 绑定子树按引用共享，同名元变量的多次出现得到同一个对象
 * - 未变化的模板子树原样返回，发生变化的复合节点标记 altered
 * - 绑定的表达式结合得比所在位置松时，外面加一对合成括号
 * - 任一错误立即中止，不返回部分替换的树
 */

import { GAP_TOKEN_TYPE } from "./ast-converter";
import type { FixResult } from "./error-handler";
import { createFixError, fail, ok } from "./error-handler";
import type {
  ExpandedNode,
  ListKind,
  ListNode,
  SubstitutedNode,
  SyntaxNode,
} from "./node";
import { createSyntheticToken, LIST_SEPARATORS } from "./node";
import type { Binding, MatchEnvironment } from "./types";

const PARENTHESIZED_TYPE = "Parenthesized";

function unbound(name: string): FixResult<never> {
  return fail(
    createFixError("METAVAR001", [`$${name}`], { metavariable: name })
  );
}

function typeMismatch(name: string, detail: string): FixResult<never> {
  return fail(
    createFixError("METAVAR002", [`$${name}`, detail], { metavariable: name })
  );
}

function isGapToken(node: SubstitutedNode): boolean {
  return node.kind === "token" && node.type === GAP_TOKEN_TYPE;
}

/**
 * 展开省略号绑定，相邻元素之间插入该列表种类的合成分隔符
 */
function expandSequence(
  name: string,
  listKind: ListKind,
  nodes: readonly SyntaxNode[]
): ExpandedNode {
  const elements: SubstitutedNode[] = [];
  nodes.forEach((node, index) => {
    if (index > 0) {
      elements.push(createSyntheticToken(LIST_SEPARATORS[listKind]));
    }
    elements.push(node);
  });
  return { kind: "expanded", name, listKind, elements, origin: null };
}

/**
 * 绑定的表达式优先级低于所在位置的要求时，用合成括号包裹
 */
function fitToSlot(node: SyntaxNode, minPrecedence: number): SubstitutedNode {
  if (
    node.kind !== "expr" ||
    node.precedence === undefined ||
    node.precedence >= minPrecedence
  ) {
    return node;
  }
  return {
    kind: "expr",
    type: PARENTHESIZED_TYPE,
    origin: null,
    altered: true,
    children: [createSyntheticToken("lparen"), node, createSyntheticToken("rparen")],
  };
}

function lookupSequence(
  environment: MatchEnvironment,
  name: string
): FixResult<readonly SyntaxNode[]> {
  const binding: Binding | undefined = environment.get(name);
  if (!binding) return unbound(name);
  if (binding.kind !== "sequence") {
    return typeMismatch(name, "省略号元变量绑定到了单个节点");
  }
  return ok(binding.nodes);
}

function replaceList(
  environment: MatchEnvironment,
  list: ListNode<SyntaxNode>
): FixResult<SubstitutedNode> {
  const items: SubstitutedNode[] = [];
  let changed = false;
  // 空展开时丢弃紧随其后的模板分隔符
  let skipNextGap = false;

  for (const item of list.items) {
    if (skipNextGap && isGapToken(item)) {
      skipNextGap = false;
      continue;
    }
    skipNextGap = false;

    if (item.kind === "ellipsis") {
      const sequence = lookupSequence(environment, item.name);
      if (!sequence.ok) return sequence;
      changed = true;

      if (sequence.value.length > 0) {
        items.push(expandSequence(item.name, list.listKind, sequence.value));
      } else if (items.length > 0 && isGapToken(items[items.length - 1])) {
        items.pop();
      } else {
        skipNextGap = true;
      }
      continue;
    }

    const replaced = replaceNode(environment, item);
    if (!replaced.ok) return replaced;
    if (replaced.value !== item) changed = true;
    items.push(replaced.value);
  }

  if (!changed) return ok(list);
  return ok({ ...list, items, altered: true });
}

function replaceNode(
  environment: MatchEnvironment,
  node: SyntaxNode
): FixResult<SubstitutedNode> {
  switch (node.kind) {
    case "token":
      return ok(node);

    case "metavar": {
      const binding = environment.get(node.name);
      if (!binding) return unbound(node.name);
      if (binding.kind !== "node") {
        return typeMismatch(node.name, "普通元变量绑定到了节点序列");
      }
      return ok(fitToSlot(binding.node, node.minPrecedence ?? 0));
    }

    case "ellipsis": {
      const sequence = lookupSequence(environment, node.name);
      if (!sequence.ok) return sequence;
      return typeMismatch(node.name, "省略号元变量只能出现在列表位置");
    }

    case "list":
      return replaceList(environment, node);

    case "expr":
    case "stmt": {
      const children: SubstitutedNode[] = [];
      let changed = false;
      for (const child of node.children) {
        const replaced = replaceNode(environment, child);
        if (!replaced.ok) return replaced;
        if (replaced.value !== child) changed = true;
        children.push(replaced.value);
      }
      if (!changed) return ok(node);
      return ok({ ...node, children, altered: true });
    }
  }
}

/**
 * replace(env, fixTemplateTree) -> SubstitutedNode | Error
 */
export function replaceMetavars(
  environment: MatchEnvironment,
  template: SyntaxNode
): FixResult<SubstitutedNode> {
  return replaceNode(environment, template);
}
