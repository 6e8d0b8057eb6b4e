/**
 * Text Patcher
 * 将渲染好的修复文本拼接回目标文件，区间外的文本保持不变
 */
import type { SourceBuffer } from "./buffer";
import { sliceText } from "./buffer";
import { invalidRange } from "./error-handler";
import type { Range } from "./range";
import { rangesOverlap, spliceRange } from "./range";

export type Replacement = { range: Range; newText: string };

export interface PatchResult<T extends Replacement> {
  content: string;
  applied: T[];
  /** 与已接受的替换重叠而被跳过的替换 */
  skipped: T[];
}

/**
 * 单个修复：prefix + fixText + suffix
 */
export function spliceFix(
  target: SourceBuffer,
  range: Range,
  fixText: string
): string {
  return spliceRange(target, range, fixText);
}

/**
 * 对同一目标文件批量应用替换
 * 按起点排序，与已接受替换重叠的替换被跳过；从后向前应用，避免位置偏移
 */
export function applyReplacements<T extends Replacement>(
  target: SourceBuffer,
  replacements: readonly T[]
): PatchResult<T> {
  for (const r of replacements) {
    if (r.range.bufferId !== target.id) {
      throw invalidRange(`替换区间属于 ${r.range.bufferId}，而不是目标文件 ${target.id}`);
    }
  }

  const ordered = [...replacements].sort(
    (a, b) => a.range.start - b.range.start || a.range.end - b.range.end
  );
  const applied: T[] = [];
  const skipped: T[] = [];
  for (const r of ordered) {
    if (applied.some((accepted) => rangesOverlap(accepted.range, r.range))) {
      skipped.push(r);
    } else {
      applied.push(r);
    }
  }

  let content = "";
  let cursor = target.length;
  for (const r of [...applied].reverse()) {
    content = r.newText + sliceText(target, r.range.end, cursor) + content;
    cursor = r.range.start;
  }
  content = sliceText(target, 0, cursor) + content;

  return { content, applied, skipped };
}
