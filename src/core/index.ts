/**
 * 核心模块索引文件
 * 导出缓冲区/区间模型、替换器、打印器和相关类型
 */

export * from "./types";
export * from "./node";
export { createSourceBuffer, sliceText } from "./buffer";
export type { SourceBuffer, OffsetUnit, BufferRole, CreateBufferOptions } from "./buffer";
export { createRange, rangeLength, rangesOverlap, sliceBuffer, spliceRange } from "./range";
export type { Range } from "./range";

// 语言适配层
export { parseSource, parseFixTemplate, findNodeByRange, maskEllipses } from "./ast-parser";
export { GAP_TOKEN_TYPE } from "./ast-converter";
export {
  bindNode,
  bindSequence,
  createEnvironment,
  environmentFromRanges,
  normalizeMetavariableName,
} from "./environment";
export type { RangeTuple } from "./environment";

// 替换与打印
export { replaceMetavars } from "./metavar-replacement";
export { printAst, printSegments, countSyntheticCharacters } from "./printer";
export { applyReplacements, spliceFix } from "./text-patcher";
export type { Replacement, PatchResult } from "./text-patcher";
export { createFixRule, renderFix, fixFindings, applyFixes } from "./autofix";

// 导出配置规范化系统
export { normalizeConfig, detectLanguage, CONFIG_DEFAULTS } from "./config-normalizer";
export type { NormalizedAutofixOptions } from "./config-normalizer";

// 导出错误处理系统
export {
  createFixError,
  enhanceError,
  formatError,
  logError,
  FixFatalError,
  ErrorCategory,
  ErrorSeverity,
} from "./error-handler";
export type { FixError, FixErrorKind, FixResult } from "./error-handler";
