/**
 * 命令行参数解析辅助函数
 */

import { InvalidArgumentError } from "commander";
import type { RangeTuple } from "./core/environment";
import type { Language } from "./types";

export type BindingSpecs = Record<string, RangeTuple | RangeTuple[]>;

const LANGUAGES: readonly Language[] = ["javascript", "typescript", "tsx"];

export function parseOffset(value: string): number {
  if (!/^\d+$/.test(value)) {
    throw new InvalidArgumentError(`偏移量必须是非负整数: ${value}`);
  }
  return parseInt(value, 10);
}

export function parseLanguage(value: string): Language {
  const language = LANGUAGES.find((candidate) => candidate === value);
  if (!language) {
    throw new InvalidArgumentError(`不支持的语言: ${value}，可选 ${LANGUAGES.join(", ")}`);
  }
  return language;
}

/**
 * "12:20" -> [12, 20]
 */
export function parseRangeTuple(value: string): RangeTuple {
  const match = /^(\d+):(\d+)$/.exec(value.trim());
  if (!match) {
    throw new InvalidArgumentError(`区间格式应为 start:end，实际为 ${value}`);
  }
  const start = parseInt(match[1], 10);
  const end = parseInt(match[2], 10);
  if (start > end) {
    throw new InvalidArgumentError(`区间起点大于终点: ${value}`);
  }
  return [start, end];
}

function splitBinding(value: string): [string, string] {
  const index = value.indexOf("=");
  if (index <= 0) {
    throw new InvalidArgumentError(`绑定格式应为 NAME=...，实际为 ${value}`);
  }
  return [value.slice(0, index), value.slice(index + 1)];
}

/**
 * --bind NAME=start:end，可重复
 */
export function collectBinding(value: string, previous: BindingSpecs): BindingSpecs {
  const [name, range] = splitBinding(value);
  return { ...previous, [name]: parseRangeTuple(range) };
}

/**
 * --bind-seq NAME=s:e,s:e，可重复；NAME= 表示空序列
 */
export function collectSequenceBinding(
  value: string,
  previous: BindingSpecs
): BindingSpecs {
  const [name, ranges] = splitBinding(value);
  const tuples = ranges.trim() === "" ? [] : ranges.split(",").map(parseRangeTuple);
  return { ...previous, [name]: tuples };
}
