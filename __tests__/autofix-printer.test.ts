/**
 * 自动修复打印器测试
 *
 * 先用真实的目标文件和模板渲染修复，再把两个缓冲区替换成同长度的伪内容
 * （目标文件全是 t，模板全是 p），从而确认输出中每个字符来自哪里：
 * 从原文提升的文本越多，需要从头打印的文本就越少。
 */
import { describe, expect, test } from "vitest";
import { findNodeByRange } from "../src/core/ast-parser";
import { createEnvironment, bindSequence, environmentFromRanges } from "../src/core/environment";
import { replaceMetavars } from "../src/core/metavar-replacement";
import { countSyntheticCharacters, printAst, printSegments } from "../src/core/printer";
import { createRange, spliceRange } from "../src/core/range";
import type { ParsedTree } from "../src/core/types";
import type { RangeTuple } from "../src/core/environment";
import { compileTemplate, fakeBuffer, parseTarget, unwrap } from "./test-helpers";

interface AutofixPrinterCase {
  target: string;
  match: RangeTuple;
  bindings: Record<string, RangeTuple | RangeTuple[]>;
  fixPattern: string;
  expected: string;
  expectedProvenance: string;
}

function render(target: ParsedTree, template: ParsedTree, bindings: AutofixPrinterCase["bindings"], fake: boolean) {
  const environment = environmentFromRanges(target, bindings);
  const substituted = unwrap(replaceMetavars(environment, template.root));
  const targetBuffer = fake ? fakeBuffer(target.buffer, "t") : target.buffer;
  const templateBuffer = fake ? fakeBuffer(template.buffer, "p") : template.buffer;
  return {
    fixText: unwrap(printAst(substituted, targetBuffer, templateBuffer)),
    targetBuffer,
  };
}

const cases: AutofixPrinterCase[] = [
  {
    target: "foo",
    match: [0, 3],
    bindings: {},
    fixPattern: "foobar",
    expected: "foobar",
    expectedProvenance: "pppppp",
  },
  {
    target: "foo + bar",
    match: [6, 9],
    bindings: {},
    fixPattern: "baz",
    expected: "foo + baz",
    expectedProvenance: "ttttttppp",
  },
  {
    target: "foo(1, 42, 423)",
    match: [0, 15],
    bindings: { REST: [[7, 9], [11, 14]] },
    fixPattern: "bar(baz, $...REST)",
    expected: "bar(baz, 42, 423)",
    expectedProvenance: "ppppppppptt, tttp",
  },
];

describe("autofix printer", () => {
  test.each(cases)("renders `$fixPattern` over `$target`", (testCase) => {
    const target = parseTarget(testCase.target);
    const template = compileTemplate(testCase.fixPattern);
    const [start, end] = testCase.match;

    const real = render(target, template, testCase.bindings, false);
    expect(spliceRange(real.targetBuffer, createRange(real.targetBuffer, start, end), real.fixText)).toBe(
      testCase.expected
    );

    const fake = render(target, template, testCase.bindings, true);
    expect(spliceRange(fake.targetBuffer, createRange(fake.targetBuffer, start, end), fake.fixText)).toBe(
      testCase.expectedProvenance
    );
  });

  test("模板中没有占位符时只提升模板文本，不合成任何字符", () => {
    const target = parseTarget("foo");
    const template = compileTemplate("obj.method(a, [1, 2], { k: v })");
    const segments = unwrap(printSegments(template.root, target.buffer, template.buffer));

    expect(segments).toEqual([
      { source: "template", text: "obj.method(a, [1, 2], { k: v })" },
    ]);
    expect(countSyntheticCharacters(segments)).toBe(0);
  });

  test("同一元变量多次出现时提升同一段原文", () => {
    const target = parseTarget("check(value)");
    const template = compileTemplate("$X === $X");
    const environment = environmentFromRanges(target, { X: [6, 11] });
    const substituted = unwrap(replaceMetavars(environment, template.root));

    expect(unwrap(printAst(substituted, target.buffer, template.buffer))).toBe("value === value");
    const fake = unwrap(printAst(substituted, fakeBuffer(target.buffer, "t"), fakeBuffer(template.buffer, "p")));
    expect(fake).toBe("tttttpppppttttt");
  });

  test("语句列表中的省略号按换行拼接，不调整缩进", () => {
    const target = parseTarget("function f() {\n  a();\n  b();\n}");
    const template = compileTemplate("function g() {\n  $...BODY\n}");
    const environment = environmentFromRanges(target, { BODY: [[17, 21], [24, 28]] });
    const substituted = unwrap(replaceMetavars(environment, template.root));

    const segments = unwrap(printSegments(substituted, target.buffer, template.buffer));
    expect(segments.map((segment) => segment.text).join("")).toBe("function g() {\n  a();\nb();\n}");
    expect(countSyntheticCharacters(segments)).toBe(1);
  });

  describe("ellipsis arity", () => {
    const target = parseTarget("call(first, second, third)");
    const template = compileTemplate("wrap($...ARGS)");
    const elementRanges: RangeTuple[] = [[5, 10], [12, 18], [20, 25]];

    test.each([
      { k: 0, expected: "wrap()" },
      { k: 1, expected: "wrap(first)" },
      { k: 3, expected: "wrap(first, second, third)" },
    ])("k = $k", ({ k, expected }) => {
      const nodes = elementRanges.slice(0, k).map(([start, end]) => {
        const node = findNodeByRange(target.root, start, end);
        if (!node) throw new Error(`no node at ${start}:${end}`);
        return node;
      });
      const environment = createEnvironment([["ARGS", bindSequence(nodes)]]);
      const substituted = unwrap(replaceMetavars(environment, template.root));
      const segments = unwrap(printSegments(substituted, target.buffer, template.buffer));

      expect(segments.map((segment) => segment.text).join("")).toBe(expected);
      expect(segments.filter((segment) => segment.source === "target")).toHaveLength(k);
      expect(countSyntheticCharacters(segments)).toBe(2 * Math.max(0, k - 1));
    });
  });

  test("省略号为空时移除模板中悬空的分隔符", () => {
    const target = parseTarget("noop()");
    const environment = createEnvironment([["REST", bindSequence([])]]);

    const leading = compileTemplate("bar(baz, $...REST)");
    expect(
      unwrap(printAst(unwrap(replaceMetavars(environment, leading.root)), target.buffer, leading.buffer))
    ).toBe("bar(baz)");

    const trailing = compileTemplate("bar($...REST, baz)");
    expect(
      unwrap(printAst(unwrap(replaceMetavars(environment, trailing.root)), target.buffer, trailing.buffer))
    ).toBe("bar(baz)");
  });

  test("printing is deterministic", () => {
    const target = parseTarget("foo(1, 42, 423)");
    const template = compileTemplate("bar($...REST, $...REST)");
    const environment = environmentFromRanges(target, { REST: [[7, 9], [11, 14]] });
    const substituted = unwrap(replaceMetavars(environment, template.root));

    const first = printAst(substituted, target.buffer, template.buffer);
    const second = printAst(substituted, target.buffer, template.buffer);
    expect(first).toEqual(second);
    expect(unwrap(first)).toBe("bar(42, 423, 42, 423)");
  });
});
