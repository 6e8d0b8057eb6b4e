/**
 * 区间模型
 * 半开区间 [start, end)，标识一段文本来自哪个缓冲区
 */

import type { SourceBuffer } from "./buffer";
import { sliceText } from "./buffer";
import { invalidRange } from "./error-handler";

export interface Range {
  readonly bufferId: string;
  readonly start: number;
  readonly end: number;
}

export function createRange(
  buffer: SourceBuffer,
  start: number,
  end: number
): Range {
  if (!Number.isInteger(start) || !Number.isInteger(end)) {
    throw invalidRange(`[${start}, ${end}) 不是整数偏移量`);
  }
  if (start < 0 || start > end || end > buffer.length) {
    throw invalidRange(
      `[${start}, ${end}) 不在缓冲区 ${buffer.id} 内 (长度 ${buffer.length})`
    );
  }
  return { bufferId: buffer.id, start, end };
}

export function rangeLength(range: Range): number {
  return range.end - range.start;
}

export function rangesOverlap(a: Range, b: Range): boolean {
  return a.bufferId === b.bufferId && a.start < b.end && b.start < a.end;
}

/** 区间覆盖的文本 */
export function sliceBuffer(buffer: SourceBuffer, range: Range): string {
  if (range.bufferId !== buffer.id) {
    throw invalidRange(`区间属于 ${range.bufferId}，而不是 ${buffer.id}`);
  }
  return sliceText(buffer, range.start, range.end);
}

/**
 * 用修复文本替换目标缓冲区中的匹配区间
 * 结果为 prefix + fixText + suffix
 */
export function spliceRange(
  target: SourceBuffer,
  range: Range,
  fixText: string
): string {
  if (range.bufferId !== target.id) {
    throw invalidRange(`匹配区间属于 ${range.bufferId}，而不是目标文件 ${target.id}`);
  }
  const prefix = sliceText(target, 0, range.start);
  const suffix = sliceText(target, range.end, target.length);
  return prefix + fixText + suffix;
}
