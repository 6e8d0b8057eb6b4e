/**
 * 语言适配层
 * 使用 @babel/parser 解析目标文件与 fix 模板，并转换为通用节点外壳
 */

import * as t from "@babel/types";
import type { SourceBuffer } from "./buffer";
import { createSourceBuffer } from "./buffer";
import type { NormalizedAutofixOptions } from "./config-normalizer";
import type { ConvertContext } from "./ast-converter";
import { convertList, convertNode, ellipsisName, GAP_TOKEN_TYPE } from "./ast-converter";
import type { FixResult } from "./error-handler";
import { createFixError, fail, FixFatalError, offsetUnitMismatch, ok } from "./error-handler";
import type { SyntaxNode } from "./node";
import type { ParsedTree } from "./types";
import { ASTParserUtils } from "./utils";

const ELLIPSIS_REGEX = /\$\.\.\.(?=[A-Z_])/g;

/**
 * 将 $...X 遮蔽为等长的标识符 $___X，使模板可以被解析且偏移量不变
 */
export function maskEllipses(text: string): {
  masked: string;
  offsets: Set<number>;
} {
  const offsets = new Set<number>();
  const masked = text.replace(ELLIPSIS_REGEX, (_match, offset: number) => {
    offsets.add(offset);
    return "$___";
  });
  return { masked, offsets };
}

function assertBabelUnit(buffer: SourceBuffer): void {
  // @babel/parser 只产出 UTF-16 偏移量
  if (buffer.unit !== "utf16") {
    throw offsetUnitMismatch(
      `@babel/parser 使用 utf16 偏移量，缓冲区 ${buffer.id} 使用 ${buffer.unit}`
    );
  }
}

function toError(error: unknown): Error {
  return error instanceof Error ? error : new Error(String(error));
}

/**
 * 解析目标文件
 */
export function parseSource(
  buffer: SourceBuffer,
  options: NormalizedAutofixOptions
): FixResult<ParsedTree> {
  assertBabelUnit(buffer);

  let file: t.File;
  try {
    file = ASTParserUtils.parseCode(buffer.text, options);
  } catch (error) {
    const originalError = toError(error);
    const lineMatch = originalError.message.match(/\((\d+):(\d+)\)/);
    return fail(
      createFixError(
        "PARSING001",
        [originalError.message, lineMatch ? lineMatch[1] : "?"],
        { filePath: options.filePath, originalError }
      )
    );
  }

  const ctx: ConvertContext = {
    buffer,
    placeholders: false,
    ellipsisOffsets: new Set(),
  };
  return ok({
    buffer,
    root: convertNode(file.program, ctx),
    language: options.language,
  });
}

/**
 * 选择模板根节点：
 * 单个无分号的表达式语句取其表达式，否则取整个语句列表
 */
function templateRoot(program: t.Program, ctx: ConvertContext): SyntaxNode {
  const statements: t.Node[] = [...program.directives, ...program.body];

  if (statements.length === 1) {
    const [statement] = statements;
    if (
      t.isExpressionStatement(statement) &&
      statement.end === statement.expression.end &&
      !(t.isIdentifier(statement.expression) && ellipsisName(statement.expression, ctx))
    ) {
      return convertNode(statement.expression, ctx);
    }
  }

  return convertList("statements", statements, ctx);
}

/**
 * 解析 fix 模板
 * $X 为元变量引用，$...X 为省略号引用；缓冲区保留原始模板文本
 */
export function parseFixTemplate(
  fixText: string,
  options: NormalizedAutofixOptions,
  ruleId = "-"
): FixResult<ParsedTree> {
  const buffer = createSourceBuffer(fixText, {
    role: "template",
    unit: options.offsetUnit,
  });
  assertBabelUnit(buffer);

  const { masked, offsets } = maskEllipses(fixText);
  const ctx: ConvertContext = {
    buffer,
    placeholders: true,
    ellipsisOffsets: offsets,
  };

  try {
    const file = ASTParserUtils.parseCode(masked, options);
    return ok({
      buffer,
      root: templateRoot(file.program, ctx),
      language: options.language,
    });
  } catch (error) {
    if (error instanceof FixFatalError) throw error;
    return fail(
      createFixError("TEMPLATE001", [fixText, ruleId], {
        originalError: toError(error),
      })
    );
  }
}

/**
 * 查找原始区间恰好为 [start, end) 的最外层节点（不含列表和 Gap token）
 */
export function findNodeByRange(
  root: SyntaxNode,
  start: number,
  end: number
): SyntaxNode | undefined {
  const origin = root.origin;
  if (origin && (origin.start > start || origin.end < end)) return undefined;

  if (
    origin &&
    origin.start === start &&
    origin.end === end &&
    root.kind !== "list" &&
    !(root.kind === "token" && root.type === GAP_TOKEN_TYPE)
  ) {
    return root;
  }

  const children =
    root.kind === "expr" || root.kind === "stmt"
      ? root.children
      : root.kind === "list"
        ? root.items
        : [];

  for (const child of children) {
    const found = findNodeByRange(child, start, end);
    if (found) return found;
  }
  return undefined;
}
