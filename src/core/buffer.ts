/**
 * 源文本缓冲区
 * 目标文件与修复模板各自对应一个不可变缓冲区，偏移量单位在创建时确定并随缓冲区携带
 */

import { randomUUID } from "crypto";
import { offsetUnitMismatch } from "./error-handler";

/**
 * 偏移量单位
 * - utf16: UTF-16 码元（JS 字符串下标，@babel/parser 使用此单位）
 * - codepoint: Unicode 码点
 */
export type OffsetUnit = "utf16" | "codepoint";

/**
 * 缓冲区角色：被修复的目标文件，或 fix 模板文本
 */
export type BufferRole = "target" | "template";

export interface SourceBuffer {
  readonly id: string;
  readonly role: BufferRole;
  readonly unit: OffsetUnit;
  readonly text: string;
  /** 以 unit 计的长度 */
  readonly length: number;
  /** codepoint 单位下预先拆分好的码点数组 */
  readonly codepoints: readonly string[] | null;
}

export interface CreateBufferOptions {
  role: BufferRole;
  id?: string;
  unit?: OffsetUnit;
}

export function createSourceBuffer(
  text: string,
  options: CreateBufferOptions
): SourceBuffer {
  const unit = options.unit ?? "utf16";
  const codepoints = unit === "codepoint" ? Object.freeze(Array.from(text)) : null;

  return Object.freeze({
    id: options.id ?? `${options.role}:${randomUUID()}`,
    role: options.role,
    unit,
    text,
    length: codepoints ? codepoints.length : text.length,
    codepoints,
  });
}

/**
 * 按偏移量截取文本，越界说明偏移量单位与缓冲区不一致
 */
export function sliceText(
  buffer: SourceBuffer,
  start: number,
  end: number
): string {
  if (start < 0 || start > end || end > buffer.length) {
    throw offsetUnitMismatch(
      `[${start}, ${end}) 超出缓冲区 ${buffer.id} 的范围 (长度 ${buffer.length} ${buffer.unit})`
    );
  }
  if (buffer.codepoints) {
    return buffer.codepoints.slice(start, end).join("");
  }
  return buffer.text.slice(start, end);
}
