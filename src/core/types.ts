/**
 * 核心处理流程相关类型定义
 */

import type { Language } from "../types";
import type { SourceBuffer } from "./buffer";
import type { FixError } from "./error-handler";
import type { SyntaxNode } from "./node";
import type { Range } from "./range";

/**
 * 解析结果：根节点中所有区间的偏移量单位由 buffer 决定
 */
export interface ParsedTree {
  readonly buffer: SourceBuffer;
  readonly root: SyntaxNode;
  readonly language: Language;
}

/**
 * 元变量绑定：单个子树，或省略号元变量对应的子树序列
 */
export type Binding =
  | { readonly kind: "node"; readonly node: SyntaxNode }
  | { readonly kind: "sequence"; readonly nodes: readonly SyntaxNode[] };

/**
 * 匹配环境：按插入顺序保存的 元变量名(不含 $ / $...) -> 绑定
 */
export type MatchEnvironment = ReadonlyMap<string, Binding>;

/**
 * 匹配器产出的一次匹配
 */
export interface MatchRecord {
  readonly environment: MatchEnvironment;
  /** 整个匹配在目标文件中的区间 */
  readonly range: Range;
  readonly language: Language;
}

/**
 * 已编译的修复规则；模板解析失败时 template 为 null，该规则不再生成修复
 */
export interface FixRule {
  readonly ruleId: string;
  readonly fixText: string;
  readonly template: ParsedTree | null;
  readonly templateError: FixError | null;
}

/**
 * 一条匹配结果及其修复（可能没有可用修复）
 */
export interface Finding {
  readonly ruleId: string;
  readonly range: Range;
  readonly fix: string | null;
  readonly fixError: FixError | null;
}

/**
 * 打印输出中的一段文本及其来源
 */
export interface PrintedSegment {
  readonly source: "target" | "template" | "synthetic";
  readonly text: string;
}
