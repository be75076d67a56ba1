/**
 * 回应生成：单枢轴拼接
 *
 * 1. 取输入中已知的词（保留重复），随机选一个作为枢轴；
 * 2. 含枢轴的句子少于 2 句时不回应；
 * 3. 有放回地抽两句 S1、S2（可能是同一句）；
 * 4. S1 中枢轴之前的词 + S2 中从枢轴到句末的词，用单个空格拼接。
 *
 * 每次随机选取都按 `随机值 mod 长度` 取下标，抽取顺序固定为 枢轴 → S1 → S2。
 */

import type { Dictionary } from '../storage/dictionary.js';
import { InvariantViolationError } from '../storage/errors.js';
import { pickRandom, type RandomSource } from '../random/randomSource.js';
import { splitWords } from '../text/tokenizer.js';

function findPivot(words: readonly string[], pivot: string): number {
  return words.findIndex((word) => word.toLowerCase() === pivot);
}

/**
 * 枢轴第一次出现之前的词；句子不含枢轴时返回 undefined
 */
export function wordsLeftOfPivot(sentence: string, pivot: string): string[] | undefined {
  const words = splitWords(sentence);
  const position = findPivot(words, pivot);
  return position === -1 ? undefined : words.slice(0, position);
}

/**
 * 从枢轴第一次出现起到句末的词（含枢轴）；句子不含枢轴时返回 undefined
 */
export function wordsRightOfPivotInclusive(sentence: string, pivot: string): string[] | undefined {
  const words = splitWords(sentence);
  const position = findPivot(words, pivot);
  return position === -1 ? undefined : words.slice(position);
}

export function respondTo(
  dictionary: Dictionary,
  line: string,
  random: RandomSource,
): string | undefined {
  const knownWords = dictionary.knownWords(line);
  if (knownWords.length === 0) {
    return undefined;
  }

  const pivot = pickRandom(knownWords, random);
  const candidates = dictionary.sentencesWithWord(pivot);
  if (candidates.length < 2) {
    return undefined;
  }

  const leftDonor = pickRandom(candidates, random);
  const rightDonor = pickRandom(candidates, random);

  const left = (wordsLeftOfPivot(leftDonor, pivot) ?? []).join(' ');
  const rightWords = wordsRightOfPivotInclusive(rightDonor, pivot);
  if (rightWords === undefined) {
    throw new InvariantViolationError(`索引指向的句子不含枢轴词 "${pivot}"`, {
      pivot,
      sentence: rightDonor,
    });
  }
  const right = rightWords.join(' ');

  return left === '' ? right : `${left} ${right}`;
}
