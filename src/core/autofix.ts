/**
 * 自动修复流程编排
 * 模板按规则只解析一次；单个匹配的修复失败只会使该匹配"没有可用修复"，不影响其他匹配
 */

import type { AutofixOptions } from "../types";
import { parseFixTemplate } from "./ast-parser";
import type { SourceBuffer } from "./buffer";
import { normalizeConfig } from "./config-normalizer";
import type { FixResult } from "./error-handler";
import { invalidRange, logError, offsetUnitMismatch } from "./error-handler";
import { replaceMetavars } from "./metavar-replacement";
import { printAst } from "./printer";
import type { PatchResult } from "./text-patcher";
import { applyReplacements } from "./text-patcher";
import type { Finding, FixRule, MatchRecord, ParsedTree } from "./types";

/**
 * 编译规则的 fix 模板，解析失败时记录一次错误并禁用该规则的自动修复
 */
export function createFixRule(
  ruleId: string,
  fixText: string,
  options: AutofixOptions = {}
): FixRule {
  const normalized = normalizeConfig(options);
  const parsed = parseFixTemplate(fixText, normalized, ruleId);

  if (!parsed.ok) {
    if (normalized.logErrors) logError(parsed.error);
    return { ruleId, fixText, template: null, templateError: parsed.error };
  }
  return { ruleId, fixText, template: parsed.value, templateError: null };
}

/**
 * 为单个匹配渲染修复文本
 */
export function renderFix(
  match: MatchRecord,
  template: ParsedTree,
  target: SourceBuffer
): FixResult<string> {
  if (match.range.bufferId !== target.id) {
    throw invalidRange(`匹配区间属于 ${match.range.bufferId}，而不是目标文件 ${target.id}`);
  }
  if (match.range.start < 0 || match.range.start > match.range.end) {
    throw invalidRange(`匹配区间 [${match.range.start}, ${match.range.end}) 的起点大于终点或为负数`);
  }
  if (match.range.end > target.length) {
    throw offsetUnitMismatch(
      `匹配区间 [${match.range.start}, ${match.range.end}) 超出目标文件长度 ${target.length} (${target.unit})`
    );
  }
  if (template.buffer.unit !== target.unit) {
    throw offsetUnitMismatch(
      `fix 模板使用 ${template.buffer.unit}，目标文件使用 ${target.unit}`
    );
  }

  const substituted = replaceMetavars(match.environment, template.root);
  if (!substituted.ok) return substituted;

  return printAst(substituted.value, target, template.buffer);
}

/**
 * 为规则的所有匹配生成修复；失败的匹配仍然报告，只是 fix 为 null
 */
export function fixFindings(
  rule: FixRule,
  target: SourceBuffer,
  matches: readonly MatchRecord[],
  options: AutofixOptions = {}
): Finding[] {
  const { logErrors } = normalizeConfig(options);

  return matches.map((match) => {
    if (!rule.template) {
      return { ruleId: rule.ruleId, range: match.range, fix: null, fixError: rule.templateError };
    }

    const rendered = renderFix(match, rule.template, target);
    if (!rendered.ok) {
      const fixError = { ...rendered.error, filePath: options.filePath };
      if (logErrors) logError(fixError);
      return { ruleId: rule.ruleId, range: match.range, fix: null, fixError };
    }
    return { ruleId: rule.ruleId, range: match.range, fix: rendered.value, fixError: null };
  });
}

type FixedFinding = Finding & { newText: string };

/**
 * 将所有可用修复拼接回目标文件
 */
export function applyFixes(
  target: SourceBuffer,
  findings: readonly Finding[]
): PatchResult<FixedFinding> {
  const replacements: FixedFinding[] = [];
  for (const finding of findings) {
    if (finding.fix !== null) {
      replacements.push({ ...finding, newText: finding.fix });
    }
  }
  return applyReplacements(target, replacements);
}
