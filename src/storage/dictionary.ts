import { splitSentences, splitWords } from '../text/tokenizer.js';
import type { RandomSource } from '../random/randomSource.js';
import { respondTo } from '../response/generator.js';
import { readDictionaryFile, writeDictionaryFile, type DictionarySnapshot } from './persistence.js';

export type { DictionarySnapshot } from './persistence.js';

/** 词 → 含该词的句子位置（有序、去重） */
export type Indices = Map<string, number[]>;

/**
 * 按码点比较小写形式（与 UTF-8 字节序一致）。
 * 直接用 `<` 比较的是 UTF-16 码元，U+E000..U+FFFF 会被排到增补平面字符之后。
 */
function compareLowercase(a: string, b: string): number {
  const left = a.toLowerCase();
  const right = b.toLowerCase();
  let offset = 0;
  while (offset < left.length && offset < right.length) {
    const x = left.codePointAt(offset) ?? 0;
    const y = right.codePointAt(offset) ?? 0;
    if (x !== y) return x < y ? -1 : 1;
    offset += x > 0xffff ? 2 : 1;
  }
  return left.length - right.length;
}

function insertWordIntoIndices(indices: Indices, word: string, position: number): void {
  const positions = indices.get(word);
  if (!positions) {
    indices.set(word, [position]);
    return;
  }
  if (!positions.includes(position)) {
    positions.push(position);
  }
}

/**
 * 词典：句子序列 + 倒排索引
 *
 * - 句子以小写形式按学习顺序追加，位置即编号，不存在规范化后相同的两句；
 * - 索引要么为空，要么与句子序列完全一致。`needsIndexRebuild()` 用于发现
 *   “有句子但没有索引”的陈旧状态（例如只保存了句子的旧文件）。
 *
 * `learn` 只做增量更新，不重排；`rebuildIndices` 会按小写形式重排句子并从头建索引，
 * 重建前后的位置不保证一致。
 *
 * 实例只属于一个调用方，不做任何加锁。
 *
 * @example
 * ```typescript
 * const dictionary = Dictionary.load('/path/to/brain.json');
 * if (dictionary.needsIndexRebuild()) dictionary.rebuildIndices();
 *
 * dictionary.learn('Hey there, everyone! How is everyone doing today?');
 * const reply = dictionary.respondTo('hello everyone', new CryptoRandomSource());
 * dictionary.writeToDisk('/path/to/brain.json');
 * ```
 */
export class Dictionary {
  private readonly knownSentences: Set<string>;

  private constructor(
    private sentences: string[],
    private indices: Indices,
  ) {
    this.knownSentences = new Set(sentences.map((sentence) => sentence.toLowerCase()));
  }

  static empty(): Dictionary {
    return new Dictionary([], new Map());
  }

  /**
   * 从快照构造，不做校验；来自磁盘的数据请走 `load`，解析阶段已检查形状与位置范围。
   */
  static fromSnapshot(snapshot: DictionarySnapshot): Dictionary {
    const indices: Indices = new Map();
    for (const [word, positions] of Object.entries(snapshot.indices)) {
      indices.set(word, [...positions]);
    }
    return new Dictionary([...snapshot.sentences], indices);
  }

  /**
   * 打开词典文件；文件不存在时创建空词典并立即写入该路径。
   *
   * @throws DictionaryIOError 文件系统错误
   * @throws DictionaryParseError 文件内容格式错误
   */
  static load(path: string): Dictionary {
    const snapshot = readDictionaryFile(path);
    if (snapshot === undefined) {
      const dictionary = Dictionary.empty();
      dictionary.writeToDisk(path);
      return dictionary;
    }
    return Dictionary.fromSnapshot(snapshot);
  }

  writeToDisk(path: string): void {
    writeDictionaryFile(path, this.toSnapshot());
  }

  get sentenceCount(): number {
    return this.sentences.length;
  }

  get wordCount(): number {
    return this.indices.size;
  }

  getSentences(): readonly string[] {
    return this.sentences;
  }

  getPositions(word: string): readonly number[] {
    return this.indices.get(word) ?? [];
  }

  toSnapshot(): DictionarySnapshot {
    const indices: Record<string, number[]> = Object.fromEntries(
      [...this.indices].map(([word, positions]): [string, number[]] => [word, [...positions]]),
    );
    return { sentences: [...this.sentences], indices };
  }

  needsIndexRebuild(): boolean {
    return this.sentences.length > 0 && this.indices.size === 0;
  }

  /**
   * 全量重建：按小写形式稳定排序句子 → 清空索引 → 逐句分词写入索引
   */
  rebuildIndices(): void {
    this.sentences.sort(compareLowercase);

    const indices: Indices = new Map();
    this.sentences.forEach((sentence, position) => {
      for (const word of splitWords(sentence.toLowerCase())) {
        insertWordIntoIndices(indices, word, position);
      }
    });
    this.indices = indices;
  }

  knowsSentence(sentence: string): boolean {
    return this.knownSentences.has(sentence.toLowerCase());
  }

  knowsWord(word: string): boolean {
    return this.indices.has(word);
  }

  /**
   * 学习一行文本：逐句追加未见过的句子，并增量更新索引。
   * 同一行内重复出现的新句子只会存一次。
   *
   * @returns 是否至少学到了一句
   */
  learn(line: string): boolean {
    let learnedSomething = false;
    for (const sentence of splitSentences(line.toLowerCase())) {
      if (this.knowsSentence(sentence)) {
        continue;
      }
      const position = this.sentences.length;
      this.sentences.push(sentence);
      this.knownSentences.add(sentence);
      for (const word of splitWords(sentence)) {
        insertWordIntoIndices(this.indices, word, position);
      }
      learnedSomething = true;
    }
    return learnedSomething;
  }

  sentencesWithWord(word: string): string[] {
    const positions = this.indices.get(word);
    if (!positions) return [];
    return positions.map((position) => this.sentences[position]);
  }

  /**
   * 输入中已被索引的词，保持原顺序且不去重：重复出现的词在随机选枢轴时权重更高。
   */
  knownWords(line: string): string[] {
    return splitWords(line.toLowerCase()).filter((word) => this.knowsWord(word));
  }

  respondTo(line: string, random: RandomSource): string | undefined {
    return respondTo(this, line, random);
  }
}
