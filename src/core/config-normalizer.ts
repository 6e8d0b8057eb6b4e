/**
 * 配置规范化模块
 * 处理和规范化所有配置选项，确保解析、替换与打印使用一致的配置
 */

import type { ParserOptions } from "@babel/parser";
import type { OffsetUnit } from "./buffer";
import type { AutofixOptions, Language } from "../types";

/**
 * 默认值常量 - 集中定义所有默认值
 */
export const CONFIG_DEFAULTS = {
  LANGUAGE: "javascript",
  // @babel/parser 的偏移量是 UTF-16 码元
  OFFSET_UNIT: "utf16",
  LOG_ERRORS: true,
} as const satisfies {
  LANGUAGE: Language;
  OFFSET_UNIT: OffsetUnit;
  LOG_ERRORS: boolean;
};

/**
 * 规范化的选项 - 所有配置项都有确定的值
 */
export interface NormalizedAutofixOptions {
  language: Language;
  offsetUnit: OffsetUnit;
  logErrors: boolean;
  filePath?: string;
  parserOptions: Required<Pick<ParserOptions, "plugins">>;
}

/**
 * 根据文件扩展名推断语言
 */
export function detectLanguage(filePath: string): Language | undefined {
  if (/\.tsx$/.test(filePath)) return "tsx";
  if (/\.(ts|mts|cts)$/.test(filePath)) return "typescript";
  if (/\.(js|jsx|mjs|cjs)$/.test(filePath)) return "javascript";
  return undefined;
}

export function normalizeConfig(
  options: AutofixOptions = {}
): NormalizedAutofixOptions {
  const language =
    options.language ??
    (options.filePath ? detectLanguage(options.filePath) : undefined) ??
    CONFIG_DEFAULTS.LANGUAGE;

  // 去除重复的插件
  const plugins = Array.from(new Set(options.parserOptions?.plugins ?? []));

  return {
    language,
    offsetUnit: CONFIG_DEFAULTS.OFFSET_UNIT,
    logErrors: options.logErrors ?? CONFIG_DEFAULTS.LOG_ERRORS,
    filePath: options.filePath,
    parserOptions: { plugins },
  };
}
