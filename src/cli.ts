#!/usr/bin/env node

import { Command } from 'commander';
import fs from 'fs';
import path from 'path';
import { parseSource } from './core/ast-parser';
import { createFixRule, fixFindings, applyFixes } from './core/autofix';
import { createSourceBuffer } from './core/buffer';
import { normalizeConfig } from './core/config-normalizer';
import { environmentFromRanges } from './core/environment';
import { enhanceError, formatError } from './core/error-handler';
import { createRange } from './core/range';
import type { BindingSpecs } from './cli-options';
import { collectBinding, collectSequenceBinding, parseLanguage, parseOffset } from './cli-options';
import type { Language } from './types';

interface CliOptions {
  file: string;
  start: number;
  end: number;
  fix: string;
  bind: BindingSpecs;
  bindSeq: BindingSpecs;
  lang?: Language;
  autofix?: boolean;
}

const program = new Command();

program
  .name('autofix-print')
  .description('根据匹配区间和 fix 模板生成修复，尽量从原文提升文本')
  .version('1.0.0')
  .requiredOption('-f, --file <file>', '目标文件')
  .requiredOption('-s, --start <offset>', '匹配区间起点 (UTF-16 偏移量)', parseOffset)
  .requiredOption('-e, --end <offset>', '匹配区间终点 (UTF-16 偏移量)', parseOffset)
  .requiredOption('-x, --fix <template>', 'fix 模板，$X 为元变量，$...X 为省略号元变量')
  .option('-b, --bind <binding>', '普通元变量绑定 NAME=start:end，可重复', collectBinding, {})
  .option('--bind-seq <binding>', '省略号元变量绑定 NAME=s:e,s:e，可重复', collectSequenceBinding, {})
  .option('-l, --lang <language>', '目标语言 (javascript | typescript | tsx)', parseLanguage)
  .option('-a, --autofix', '将修复写回文件。警告：可能造成数据丢失')
  .action((cmdOptions: CliOptions) => {
    const filePath = path.resolve(cmdOptions.file);
    const options = { filePath, language: cmdOptions.lang };

    try {
      const target = createSourceBuffer(fs.readFileSync(filePath, 'utf8'), {
        role: 'target',
        id: filePath,
      });
      const normalized = normalizeConfig(options);
      const parsed = parseSource(target, normalized);
      if (!parsed.ok) {
        console.error(formatError(parsed.error));
        process.exitCode = 1;
        return;
      }

      const environment = environmentFromRanges(parsed.value, {
        ...cmdOptions.bind,
        ...cmdOptions.bindSeq,
      });
      const match = {
        environment,
        range: createRange(target, cmdOptions.start, cmdOptions.end),
        language: normalized.language,
      };

      const rule = createFixRule('cli', cmdOptions.fix, options);
      const findings = fixFindings(rule, target, [match], options);
      const result = applyFixes(target, findings);

      if (result.applied.length === 0) {
        console.error('没有可用的修复');
        process.exitCode = 1;
        return;
      }

      if (cmdOptions.autofix) {
        fs.writeFileSync(filePath, result.content);
        console.log(`已修复 ${filePath}`);
      } else {
        process.stdout.write(result.content);
      }
    } catch (error) {
      console.error(formatError(enhanceError(error, filePath)));
      process.exitCode = 1;
    }
  });

program.parse();
