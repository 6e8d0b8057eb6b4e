/**
 * 测试辅助工具
 * 为测试用例提供解析目标文件、编译模板和构造伪缓冲区的便利函数
 */
import { parseFixTemplate, parseSource } from "../src/core/ast-parser";
import type { SourceBuffer } from "../src/core/buffer";
import { createSourceBuffer } from "../src/core/buffer";
import { normalizeConfig } from "../src/core/config-normalizer";
import type { FixResult } from "../src/core/error-handler";
import type { ParsedTree } from "../src/core/types";
import type { AutofixOptions } from "../src/types";

export function unwrap<T>(result: FixResult<T>): T {
  if (!result.ok) {
    throw new Error(`[${result.error.code}] ${result.error.message}`);
  }
  return result.value;
}

export function expectError<T>(result: FixResult<T>) {
  if (result.ok) {
    throw new Error("expected a failure, got a value");
  }
  return result.error;
}

export function parseTarget(text: string, options: AutofixOptions = {}): ParsedTree {
  const buffer = createSourceBuffer(text, { role: "target" });
  return unwrap(parseSource(buffer, normalizeConfig(options)));
}

export function compileTemplate(text: string, options: AutofixOptions = {}): ParsedTree {
  return unwrap(parseFixTemplate(text, normalizeConfig(options)));
}

/**
 * 构造与原缓冲区同 id、同长度，但内容全部为 fill 字符的伪缓冲区，
 * 用于区分输出中的每个字符来自目标文件、fix 模板还是合成
 */
export function fakeBuffer(buffer: SourceBuffer, fill: string): SourceBuffer {
  return createSourceBuffer(fill.repeat(buffer.length), {
    role: buffer.role,
    id: buffer.id,
    unit: buffer.unit,
  });
}
