#!/usr/bin/env node
/**
 * BabbleBot 命令行工具
 *
 * 用法：
 *   babblebot learn <dictionary> [files...]
 *   babblebot respond <dictionary> <words...>
 *   babblebot rebuild <dictionary>
 *   babblebot stats <dictionary> [--json]
 *   babblebot chat <dictionary> [--no-learn] [--reply-rate <rate>]
 *
 * 词典文件不存在时会自动创建。
 */

import { Command, InvalidArgumentError } from 'commander';
import { readFileSync, realpathSync } from 'node:fs';
import { createInterface } from 'node:readline';
import { fileURLToPath } from 'node:url';

import { BabbleBot } from '../babbleBot.js';

function parseReplyRate(value: string): number {
  const rate = Number(value);
  if (!Number.isFinite(rate) || rate < 0 || rate > 1) {
    throw new InvalidArgumentError('回应率必须在 [0, 1] 之间');
  }
  return rate;
}

function nonEmptyLines(text: string): string[] {
  return text.split(/\r?\n/).filter((line) => line.trim().length > 0);
}

async function collectLines(input: NodeJS.ReadableStream): Promise<string[]> {
  const lines: string[] = [];
  const rl = createInterface({ input, crlfDelay: Infinity });
  for await (const line of rl) {
    if (line.trim().length > 0) lines.push(line);
  }
  return lines;
}

/**
 * 交互式对话：逐行回应并学习，输入正常结束后写盘；中途出错时原样抛出，不写盘
 *
 * @returns 处理的行数
 */
export async function runChat(
  bot: BabbleBot,
  input: NodeJS.ReadableStream,
  output: NodeJS.WritableStream,
): Promise<number> {
  let handled = 0;
  const rl = createInterface({ input, crlfDelay: Infinity });
  for await (const line of rl) {
    if (line.trim().length === 0) continue;
    handled += 1;
    const reply = bot.converse(line);
    if (reply !== undefined) {
      output.write(`${reply}\n`);
    }
  }
  bot.flush();
  return handled;
}

/**
 * 创建 BabbleBot CLI 程序
 */
export function createBabbleBotCLI(): Command {
  const program = new Command();

  program.name('babblebot').description('BabbleBot 句子拼接对话机器人').version('0.1.0');

  program
    .command('learn')
    .description('逐行学习文件内容（未给出文件时读取标准输入），完成后写盘')
    .argument('<dictionary>', '词典文件路径')
    .argument('[files...]', '待学习的文本文件')
    .action(async (dictionary: string, files: string[]) => {
      const bot = BabbleBot.open(dictionary);
      const lines =
        files.length > 0
          ? files.flatMap((file) => nonEmptyLines(readFileSync(file, 'utf8')))
          : await collectLines(process.stdin);

      let learned = 0;
      for (const line of lines) {
        if (bot.learn(line)) learned += 1;
      }
      bot.flush();
      console.log(`已学习 ${learned}/${lines.length} 行`);
    });

  program
    .command('respond')
    .description('对一行输入生成一次回应')
    .argument('<dictionary>', '词典文件路径')
    .argument('<words...>', '输入文本')
    .action((dictionary: string, words: string[]) => {
      const bot = BabbleBot.open(dictionary);
      const reply = bot.respondTo(words.join(' '));
      if (reply === undefined) {
        console.error('（没有可用的回应）');
        process.exitCode = 1;
        return;
      }
      console.log(reply);
    });

  program
    .command('rebuild')
    .description('重排句子并重建倒排索引')
    .argument('<dictionary>', '词典文件路径')
    .action((dictionary: string) => {
      const bot = BabbleBot.open(dictionary, { rebuildIndexes: true });
      bot.flush();
      const stats = bot.getStats();
      console.log(`索引已重建：${stats.sentences} 条句子，${stats.words} 个词`);
    });

  program
    .command('stats')
    .description('显示词典统计')
    .argument('<dictionary>', '词典文件路径')
    .option('--json', '以 JSON 输出')
    .action((dictionary: string, options: { json?: boolean }) => {
      const stats = BabbleBot.open(dictionary).getStats();
      if (options.json) {
        console.log(JSON.stringify(stats));
        return;
      }
      console.log(`sentences: ${stats.sentences}`);
      console.log(`words: ${stats.words}`);
    });

  program
    .command('chat')
    .description('从标准输入逐行对话，结束时写盘')
    .argument('<dictionary>', '词典文件路径')
    .option('--no-learn', '只回应，不学习')
    .option('--reply-rate <rate>', '回应概率 [0, 1]', parseReplyRate, 1)
    .action(async (dictionary: string, options: { learn: boolean; replyRate: number }) => {
      const bot = BabbleBot.open(dictionary, {
        learning: options.learn,
        replyRate: options.replyRate,
      });
      await runChat(bot, process.stdin, process.stdout);
    });

  return program;
}

function isEntryPoint(): boolean {
  const entry = process.argv[1];
  if (entry === undefined) return false;
  try {
    return realpathSync(entry) === fileURLToPath(import.meta.url);
  } catch {
    return false;
  }
}

// CLI程序入口
if (isEntryPoint()) {
  createBabbleBotCLI()
    .parseAsync(process.argv)
    .catch((error: unknown) => {
      console.error('❌ 执行失败:', error instanceof Error ? error.message : error);
      process.exitCode = 1;
    });
}

export default createBabbleBotCLI;
