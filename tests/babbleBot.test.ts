import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { readFileSync, writeFileSync } from 'node:fs';

import { BabbleBot } from '@/babbleBot.js';
import { SequenceRandomSource, StepRandomSource } from '@/random/randomSource.js';
import { cleanupWorkspace, makeWorkspace, within } from './helpers/tempfs.js';

describe('BabbleBot', () => {
  let workspace: string;
  let dictionaryPath: string;

  beforeEach(async () => {
    workspace = await makeWorkspace('bot');
    dictionaryPath = within(workspace, 'brain.json');
  });

  afterEach(async () => {
    vi.restoreAllMocks();
    await cleanupWorkspace(workspace);
  });

  it('首次打开创建词典文件，flush 后持久化学到的句子', () => {
    const bot = BabbleBot.open(dictionaryPath);
    expect(readFileSync(dictionaryPath, 'utf8')).toBe('{"sentences":[],"indices":{}}');

    expect(bot.learn('Crabs are great. Crabs are great.')).toBe(true);
    expect(bot.getStats()).toEqual({ sentences: 1, words: 3 });
    bot.flush();

    const reopened = BabbleBot.open(dictionaryPath);
    expect(reopened.getDictionary().getSentences()).toEqual(['crabs are great.']);
    expect(reopened.getPath()).toBe(dictionaryPath);
  });

  it('打开缺少索引的词典时自动重建并输出警告', () => {
    const warn = vi.spyOn(console, 'warn').mockImplementation(() => undefined);
    writeFileSync(
      dictionaryPath,
      '{"sentences":["there are many crabs","hey there everyone"],"indices":{}}',
      'utf8',
    );

    const bot = BabbleBot.open(dictionaryPath);

    expect(warn).toHaveBeenCalledTimes(1);
    expect(warn).toHaveBeenCalledWith(`[BabbleBot] 正在重建索引（2 条句子）: ${dictionaryPath}`);
    expect(bot.getDictionary().getSentences()).toEqual([
      'hey there everyone',
      'there are many crabs',
    ]);
    expect(bot.getDictionary().getPositions('there')).toEqual([0, 1]);
  });

  it('rebuildIndexes 选项强制重排', () => {
    const warn = vi.spyOn(console, 'warn').mockImplementation(() => undefined);
    const first = BabbleBot.open(dictionaryPath);
    first.learn('zebra. apple.');
    first.flush();

    const untouched = BabbleBot.open(dictionaryPath);
    expect(untouched.getDictionary().getSentences()).toEqual(['zebra.', 'apple.']);
    expect(warn).not.toHaveBeenCalled();

    const rebuilt = BabbleBot.open(dictionaryPath, { rebuildIndexes: true });
    expect(rebuilt.getDictionary().getSentences()).toEqual(['apple.', 'zebra.']);
    expect(warn).toHaveBeenCalledTimes(1);
  });

  it('非法选项抛出 TypeError', () => {
    expect(() => BabbleBot.open(dictionaryPath, { replyRate: 3 })).toThrowError(TypeError);
  });

  it('使用注入的随机数来源生成回应', () => {
    const bot = BabbleBot.open(dictionaryPath, { random: new StepRandomSource(2, 1) });
    for (const sentence of [
      'hey there everyone',
      'everyone is a crab',
      'crabs are great',
      'there are many crabs',
      'crabs',
    ]) {
      bot.learn(sentence);
    }
    expect(bot.respondTo('Hey there everyone!')).toBe('everyone');
  });

  it('未指定 random 时使用默认随机来源生成回应', () => {
    const bot = BabbleBot.open(dictionaryPath);
    bot.learn('alpha beta. alpha gamma.');
    expect(['alpha beta', 'alpha gamma']).toContain(bot.respondTo('alpha'));
  });

  it('converse 先基于已有词典回应，再学习输入', () => {
    const bot = BabbleBot.open(dictionaryPath, { random: new SequenceRandomSource([0, 1, 0]) });
    bot.learn('the cat sat. the dog ran.');

    // 已知词 [the, dog]；the → ["the cat sat.", "the dog ran."]
    // S1 = "the dog ran."，S2 = "the cat sat."
    expect(bot.converse('The dog barked!')).toBe('the cat sat');
    expect(bot.getDictionary().knowsSentence('the dog barked!')).toBe(true);
  });

  it('learning 关闭时不学习', () => {
    const bot = BabbleBot.open(dictionaryPath, { learning: false });
    expect(bot.learn('something new.')).toBe(false);
    expect(bot.converse('something else.')).toBeUndefined();
    expect(bot.getStats()).toEqual({ sentences: 0, words: 0 });
  });

  it('replyRate 为 0 时从不回应，但照常学习', () => {
    const random = new SequenceRandomSource([]);
    const bot = BabbleBot.open(dictionaryPath, { replyRate: 0, random });
    bot.learn('a b. a c.');
    expect(bot.converse('a')).toBeUndefined();
    expect(bot.getStats().sentences).toBe(3);
  });

  it('replyRate 介于 0 与 1 之间时额外抽一次随机数决定是否回应', () => {
    // 第一轮：37 % 100 = 37 ≥ 30，沉默；第二轮：129 % 100 = 29 < 30，回应
    const random = new SequenceRandomSource([37, 129, 0, 0, 0]);
    const bot = BabbleBot.open(dictionaryPath, { replyRate: 0.3, random });
    bot.learn('a b. a c.');

    expect(bot.converse('a')).toBeUndefined();
    expect(random.remaining).toBe(4);
    // 第一轮学到了 "a"，a → ["a b.", "a c.", "a"]；S1、S2 都取 "a b."
    expect(bot.converse('a')).toBe('a b');
    expect(random.remaining).toBe(0);
  });
});
