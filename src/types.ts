import type { ParserOptions } from "@babel/parser";

/**
 * 支持的目标语言，每种语言保留自己的语法
 */
export type Language = "javascript" | "typescript" | "tsx";

/**
 * 自定义解析器选项，支持用户传递自己的ParserOptions配置
 * Custom parser options that allow users to pass their own ParserOptions configuration
 */
export interface CustomParserOptions {
  /**
   * Babel解析器插件列表，用于支持特定的语法特性
   * List of Babel parser plugins for supporting specific syntax features
   */
  plugins?: ParserOptions["plugins"];
}

/**
 * Configuration options for parsing templates and rendering fixes.
 * 解析模板与生成修复文本的配置选项。
 */
export interface AutofixOptions {
  /**
   * 目标语言。未指定时根据 filePath 的扩展名推断，默认 "javascript"
   * Target language. Inferred from filePath when omitted.
   */
  language?: Language;

  /**
   * 目标文件路径，仅用于语言推断和错误信息
   */
  filePath?: string;

  /**
   * 生成修复失败时是否通过 console 输出错误。
   * Whether failures are written to the console. Default is true.
   */
  logErrors?: boolean;

  /**
   * 自定义解析器选项
   * 目前仅支持plugins属性
   */
  parserOptions?: CustomParserOptions;
}
