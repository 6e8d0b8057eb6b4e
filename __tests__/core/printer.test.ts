/**
 * 结构化打印器单元测试
 * 使用手工构造的节点，覆盖提升、合成、递归拼接和错误分支
 */

import { describe, it, expect } from 'vitest';
import { createSourceBuffer } from '../../src/core/buffer';
import { FixFatalError } from '../../src/core/error-handler';
import type { SubstitutedNode } from '../../src/core/node';
import {
  createComposite,
  createList,
  createMetavarRef,
  createSyntheticToken,
  createToken,
} from '../../src/core/node';
import { printAst, printSegments } from '../../src/core/printer';
import { createRange } from '../../src/core/range';
import { expectError, unwrap } from '../test-helpers';

describe('printAst', () => {
  const target = createSourceBuffer('alpha(beta, gamma)', { role: 'target', id: 'target.js' });
  const template = createSourceBuffer('f(x)', { role: 'template', id: 'template' });

  it('should lift an unaltered composite as one slice', () => {
    const call = createComposite(
      'expr',
      'CallExpression',
      [
        createToken('Identifier', createRange(template, 0, 1)),
        createToken('Gap', createRange(template, 1, 4)),
      ],
      createRange(template, 0, 4)
    );

    expect(unwrap(printSegments(call, target, template))).toEqual([{ source: 'template', text: 'f(x)' }]);
  });

  it('should recurse into an altered composite and concatenate children in order', () => {
    const altered: SubstitutedNode = {
      kind: 'expr',
      type: 'CallExpression',
      origin: createRange(template, 0, 4),
      altered: true,
      children: [
        createToken('Identifier', createRange(template, 0, 1)),
        createToken('Gap', createRange(template, 1, 2)),
        {
          kind: 'expanded',
          name: 'ARGS',
          listKind: 'arguments',
          origin: null,
          elements: [
            createToken('Identifier', createRange(target, 6, 10)),
            createSyntheticToken('comma'),
            createToken('Identifier', createRange(target, 12, 17)),
          ],
        },
        createToken('Gap', createRange(template, 3, 4)),
      ],
    };

    expect(unwrap(printSegments(altered, target, template))).toEqual([
      { source: 'template', text: 'f' },
      { source: 'template', text: '(' },
      { source: 'target', text: 'beta' },
      { source: 'synthetic', text: ', ' },
      { source: 'target', text: 'gamma' },
      { source: 'template', text: ')' },
    ]);
  });

  it('should print an empty list without origin as nothing', () => {
    expect(unwrap(printAst(createList('arguments', [], null), target, template))).toBe('');
  });

  it('should print the newline separator for statement lists', () => {
    expect(unwrap(printAst(createSyntheticToken('newline'), target, template))).toBe('\n');
  });

  describe('UnprintableNode', () => {
    it('should reject a token with neither origin nor synthetic form', () => {
      const error = expectError(printAst({ kind: 'token', type: 'Identifier', origin: null }, target, template));
      expect(error.code).toBe('PRINT001');
      expect(error.kind).toBe('UnprintableNode');
      expect(error.message).toBe('无法打印节点: Identifier');
    });

    it('should reject an unresolved metavariable reference', () => {
      const error = expectError(printAst(createMetavarRef('X', createRange(template, 2, 3)), target, template));
      expect(error.kind).toBe('UnprintableNode');
      expect(error.message).toBe('无法打印节点: 未解析的元变量引用 $X');
    });

    it('should reject an origin that names neither buffer', () => {
      const other = createSourceBuffer('zzz', { role: 'target', id: 'other.js' });
      const error = expectError(printAst(createToken('Identifier', createRange(other, 0, 3)), target, template));
      expect(error.kind).toBe('UnprintableNode');
      expect(error.message).toContain('other.js');
    });

    it('should not return text when a nested child fails', () => {
      const list = createList(
        'arguments',
        [createToken('Identifier', createRange(template, 2, 3)), createMetavarRef('Y', null)],
        null
      );
      expect(printAst(list, target, template).ok).toBe(false);
    });
  });

  describe('offset units', () => {
    it('should lift by code points from codepoint buffers', () => {
      const emojiTarget = createSourceBuffer('go(😀, 1)', { role: 'target', id: 'emoji.js', unit: 'codepoint' });
      const emojiTemplate = createSourceBuffer('$X', { role: 'template', id: 'emoji-template', unit: 'codepoint' });

      expect(unwrap(printAst(createToken('Emoji', createRange(emojiTarget, 3, 4)), emojiTarget, emojiTemplate))).toBe(
        '😀'
      );
    });

    it('should throw when target and template use different units', () => {
      const codepointTemplate = createSourceBuffer('f(x)', { role: 'template', unit: 'codepoint' });
      expect(() => printAst(createSyntheticToken('comma'), target, codepointTemplate)).toThrow(FixFatalError);
    });

    it('should throw when an origin lies outside its buffer', () => {
      const shortTarget = createSourceBuffer('ab', { role: 'target', id: 'target.js' });
      const node = createToken('Identifier', createRange(target, 6, 10));

      try {
        printAst(node, shortTarget, template);
        expect.unreachable();
      } catch (error) {
        expect(error).toBeInstanceOf(FixFatalError);
        expect(error instanceof FixFatalError && error.fixError.kind).toBe('OffsetUnitMismatch');
      }
    });
  });
});
