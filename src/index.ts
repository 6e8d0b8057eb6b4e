import type { SourceBuffer } from "./core/buffer";
import { createFixRule, fixFindings, applyFixes } from "./core/autofix";
import type { PatchResult } from "./core/text-patcher";
import type { Finding, MatchRecord } from "./core/types";
import type { AutofixOptions } from "./types";

// 导出核心模块
export * from "./core";
export type { AutofixOptions, Language, CustomParserOptions } from "./types";

/**
 * 对一个目标文件应用一条规则的所有匹配
 * 匹配区间必须指向同一个目标缓冲区
 */
export function autofixFile(
  target: SourceBuffer,
  ruleId: string,
  fixText: string,
  matches: readonly MatchRecord[],
  options: AutofixOptions = {}
): PatchResult<Finding & { newText: string }> & { findings: Finding[] } {
  const rule = createFixRule(ruleId, fixText, options);
  const findings = fixFindings(rule, target, matches, options);
  return { ...applyFixes(target, findings), findings };
}

export default autofixFile;
