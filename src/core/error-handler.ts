/**
 * 错误处理模块
 * 提供自动修复生成过程中统一的错误类型、错误生成和格式化方法
 */

// 错误类别枚举
export enum ErrorCategory {
  PARSING = "PARSING", // 解析错误（目标文件或修复模板）
  SUBSTITUTION = "SUBSTITUTION", // 元变量替换错误
  PRINTING = "PRINTING", // 打印错误
  INTERNAL = "INTERNAL", // 内部不变量被破坏
  UNKNOWN = "UNKNOWN", // 未知错误
}

// 错误严重级别
export enum ErrorSeverity {
  WARNING = "WARNING", // 警告，不会中断处理
  ERROR = "ERROR", // 错误，当前匹配没有可用的修复
  FATAL = "FATAL", // 致命错误，中断整个处理流程
}

/**
 * 错误种类，与错误代码一一对应
 */
export type FixErrorKind =
  | "TemplateParseError"
  | "TargetParseError"
  | "UnboundMetavariable"
  | "TypeMismatch"
  | "UnprintableNode"
  | "OffsetUnitMismatch"
  | "InvalidRange"
  | "Unknown";

// 统一错误接口
export interface FixError {
  code: string; // 错误代码，例如 METAVAR001
  kind: FixErrorKind; // 错误种类
  category: ErrorCategory; // 错误类别
  message: string; // 错误信息
  details?: string; // 详细信息
  metavariable?: string; // 相关的元变量名
  filePath?: string; // 相关文件路径
  line?: number; // 行号
  column?: number; // 列号
  severity: ErrorSeverity; // 严重级别
  suggestion?: string; // 修复建议
  originalError?: Error; // 原始错误
}

/**
 * 替换/打印流程的返回结果
 */
export type FixResult<T> =
  | { ok: true; value: T }
  | { ok: false; error: FixError };

export function ok<T>(value: T): FixResult<T> {
  return { ok: true, value };
}

export function fail<T>(error: FixError): FixResult<T> {
  return { ok: false, error };
}

// 预定义错误代码和对应信息
interface ErrorDefinition {
  code: string;
  kind: FixErrorKind;
  category: ErrorCategory;
  messageTemplate: string;
  severity: ErrorSeverity;
  suggestionTemplate?: string;
}

// 错误定义集
const errorDefinitions: Record<string, ErrorDefinition> = {
  // 解析错误
  TEMPLATE001: {
    code: "TEMPLATE001",
    kind: "TemplateParseError",
    category: ErrorCategory.PARSING,
    messageTemplate: "修复模板解析失败: {0}",
    severity: ErrorSeverity.ERROR,
    suggestionTemplate:
      "请检查规则 {1} 的 fix 模板在目标语言下是否为合法代码，该规则的自动修复已被禁用",
  },
  PARSING001: {
    code: "PARSING001",
    kind: "TargetParseError",
    category: ErrorCategory.PARSING,
    messageTemplate: "解析文件失败: {0}",
    severity: ErrorSeverity.ERROR,
    suggestionTemplate:
      "请检查文件语法是否正确，特别是第 {1} 行附近。可能是语法错误或不支持的语法特性导致",
  },

  // 元变量替换错误
  METAVAR001: {
    code: "METAVAR001",
    kind: "UnboundMetavariable",
    category: ErrorCategory.SUBSTITUTION,
    messageTemplate: "元变量 {0} 在匹配结果中没有绑定",
    severity: ErrorSeverity.ERROR,
    suggestionTemplate:
      "fix 模板只能引用 pattern 中出现过的元变量，请检查 {0} 的拼写",
  },
  METAVAR002: {
    code: "METAVAR002",
    kind: "TypeMismatch",
    category: ErrorCategory.SUBSTITUTION,
    messageTemplate: "元变量 {0} 的绑定类型不匹配: {1}",
    severity: ErrorSeverity.ERROR,
    suggestionTemplate:
      "省略号元变量($...X)只能用于列表位置并绑定到序列，普通元变量($X)只能绑定到单个节点",
  },

  // 打印错误
  PRINT001: {
    code: "PRINT001",
    kind: "UnprintableNode",
    category: ErrorCategory.PRINTING,
    messageTemplate: "无法打印节点: {0}",
    severity: ErrorSeverity.ERROR,
    suggestionTemplate:
      "节点既没有可用的原始区间，也不是可合成的连接符，该匹配没有可用的修复",
  },

  // 内部错误
  RANGE001: {
    code: "RANGE001",
    kind: "OffsetUnitMismatch",
    category: ErrorCategory.INTERNAL,
    messageTemplate: "偏移量单位不一致: {0}",
    severity: ErrorSeverity.FATAL,
    suggestionTemplate:
      "解析器、匹配器与打印器必须使用同一种偏移量单位，这是内部错误，请提交问题报告",
  },
  RANGE002: {
    code: "RANGE002",
    kind: "InvalidRange",
    category: ErrorCategory.INTERNAL,
    messageTemplate: "区间无效: {0}",
    severity: ErrorSeverity.FATAL,
    suggestionTemplate: "匹配区间必须指向被修复的目标文件，这是内部错误，请提交问题报告",
  },

  // 通用错误
  GENERAL001: {
    code: "GENERAL001",
    kind: "Unknown",
    category: ErrorCategory.UNKNOWN,
    messageTemplate: "未知错误: {0}",
    severity: ErrorSeverity.ERROR,
    suggestionTemplate:
      "请尝试简化 fix 模板，如果问题持续存在，请提交问题报告",
  },
};

/**
 * 创建格式化的错误对象
 */
export function createFixError(
  errorCode: string,
  params: string[] = [],
  options: {
    filePath?: string;
    line?: number;
    column?: number;
    metavariable?: string;
    originalError?: Error;
  } = {}
): FixError {
  const definition = errorDefinitions[errorCode] || errorDefinitions.GENERAL001;

  // 替换消息模板中的参数
  let message = definition.messageTemplate;
  let suggestion = definition.suggestionTemplate || "";

  params.forEach((param, index) => {
    message = message.split(`{${index}}`).join(String(param));
    suggestion = suggestion.split(`{${index}}`).join(String(param));
  });

  // 从原始错误中提取位置信息（如果有）
  let line = options.line;
  let column = options.column;

  if (options.originalError && !line && !column) {
    const babelMatch = options.originalError.message.match(/\((\d+):(\d+)\)/);
    if (babelMatch) {
      line = parseInt(babelMatch[1], 10);
      column = parseInt(babelMatch[2], 10);
    }
  }

  return {
    code: definition.code,
    kind: definition.kind,
    category: definition.category,
    message,
    details: options.originalError?.message,
    metavariable: options.metavariable,
    filePath: options.filePath,
    line,
    column,
    severity: definition.severity,
    suggestion,
    originalError: options.originalError,
  };
}

/**
 * 致命错误：偏移量单位不一致等内部不变量被破坏时抛出，不会被降级处理
 */
export class FixFatalError extends Error {
  readonly fixError: FixError;

  constructor(fixError: FixError) {
    super(formatError(fixError));
    this.name = "FixFatalError";
    this.fixError = fixError;
  }
}

export function offsetUnitMismatch(detail: string): FixFatalError {
  return new FixFatalError(createFixError("RANGE001", [detail]));
}

export function invalidRange(detail: string): FixFatalError {
  return new FixFatalError(createFixError("RANGE002", [detail]));
}

/**
 * 格式化错误为用户友好的消息
 */
export function formatError(error: FixError): string {
  let formattedMessage = `[${error.code}] ${error.message}`;

  if (error.filePath) {
    formattedMessage += `\n文件: ${error.filePath}`;
    if (error.line) {
      formattedMessage += `:${error.line}`;
      if (error.column) {
        formattedMessage += `:${error.column}`;
      }
    }
  }

  if (error.details && error.details !== error.message) {
    formattedMessage += `\n详情: ${error.details}`;
  }

  if (error.suggestion) {
    formattedMessage += `\n建议: ${error.suggestion}`;
  }

  return formattedMessage;
}

/**
 * 记录错误
 */
export function logError(error: FixError): void {
  const formattedError = formatError(error);

  if (error.severity === ErrorSeverity.WARNING) {
    console.warn(formattedError);
  } else {
    console.error(formattedError);
  }
}

/**
 * 将任意抛出值包装为 FixError
 */
export function enhanceError(error: unknown, filePath?: string): FixError {
  if (error instanceof FixFatalError) {
    return error.fixError;
  }
  const originalError =
    error instanceof Error ? error : new Error(String(error));
  return createFixError("GENERAL001", [originalError.message], {
    filePath,
    originalError,
  });
}
