/**
 * 核心共用工具方法
 * 提供 @babel/parser 的解析配置
 */

import type { ParserOptions } from "@babel/parser";
import { parse } from "@babel/parser";
import type * as t from "@babel/types";
import type { Language } from "../types";
import type { NormalizedAutofixOptions } from "./config-normalizer";

/**
 * AST解析工具类
 */
export class ASTParserUtils {
  /**
   * 获取默认解析器插件
   */
  static getDefaultParserPlugins(language: Language): ParserOptions["plugins"] {
    const plugins: ParserOptions["plugins"] = ["decorators-legacy"];

    if (language === "typescript") {
      plugins.push("typescript");
    } else if (language === "tsx") {
      plugins.push("typescript", "jsx");
    } else {
      plugins.push("jsx");
    }

    return plugins;
  }

  /**
   * 从规范化配置获取解析器配置，支持用户自定义插件
   * fix 模板常常是代码片段，因此放宽 return/await/import 的位置限制
   */
  static getParserConfig(options: NormalizedAutofixOptions): ParserOptions {
    const allPlugins = [
      ...(this.getDefaultParserPlugins(options.language) || []),
      ...(options.parserOptions.plugins || []),
    ];

    return {
      sourceType: "module" as const,
      strictMode: false,
      allowReturnOutsideFunction: true,
      allowAwaitOutsideFunction: true,
      allowImportExportEverywhere: true,
      plugins: Array.from(new Set(allPlugins)),
    };
  }

  /**
   * 使用规范化配置解析代码
   */
  static parseCode(code: string, options: NormalizedAutofixOptions): t.File {
    return parse(code, this.getParserConfig(options));
  }
}
