/**
 * 词典持久化（JSON 文档）
 *
 * 文件格式：
 * ```json
 * { "sentences": ["hey there, everyone!"], "indices": { "hey": [0], "there": [0], "everyone": [0] } }
 * ```
 * - `sentences` 有序，位置即句子编号；
 * - `indices` 键顺序无意义，每个键下的位置列表顺序有意义。
 *
 * 读写均为同步阻塞调用，每次操作只访问一次文件系统，不重试。
 */

import { readFileSync, writeFileSync } from 'node:fs';

import { DictionaryIOError, DictionaryParseError, DictionarySerializeError } from './errors.js';

export interface DictionarySnapshot {
  sentences: string[];
  indices: Record<string, number[]>;
}

function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return value !== null && typeof value === 'object' && !Array.isArray(value);
}

function isMissingFile(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'ENOENT';
}

export function serializeDictionarySnapshot(snapshot: DictionarySnapshot, path?: string): string {
  try {
    return JSON.stringify({ sentences: snapshot.sentences, indices: snapshot.indices });
  } catch (error) {
    throw new DictionarySerializeError(`词典序列化失败: ${describeError(error)}`, path, error);
  }
}

/**
 * 解析并校验持久化文档；字段形状不符、位置越界或重复均视为格式错误。
 */
export function parseDictionarySnapshot(text: string, path?: string): DictionarySnapshot {
  let raw: unknown;
  try {
    raw = JSON.parse(text);
  } catch (error) {
    throw new DictionaryParseError(`词典文件不是合法的 JSON: ${describeError(error)}`, path, error);
  }

  if (!isRecord(raw)) {
    throw new DictionaryParseError('词典文档必须是对象', path);
  }

  const { sentences, indices } = raw;
  if (!Array.isArray(sentences)) {
    throw new DictionaryParseError('字段 sentences 必须是字符串数组', path);
  }
  const parsedSentences: string[] = [];
  const seen = new Set<string>();
  for (const sentence of sentences) {
    if (typeof sentence !== 'string') {
      throw new DictionaryParseError('字段 sentences 必须是字符串数组', path);
    }
    const normalized = sentence.toLowerCase();
    if (seen.has(normalized)) {
      throw new DictionaryParseError(`句子重复: ${JSON.stringify(sentence)}`, path);
    }
    seen.add(normalized);
    parsedSentences.push(sentence);
  }

  if (!isRecord(indices)) {
    throw new DictionaryParseError('字段 indices 必须是 词 → 位置数组 的映射', path);
  }
  const parsedIndices: Array<[string, number[]]> = [];
  for (const [word, positions] of Object.entries(indices)) {
    if (!Array.isArray(positions)) {
      throw new DictionaryParseError(`索引项 ${JSON.stringify(word)} 必须是位置数组`, path);
    }
    const list: number[] = [];
    for (const position of positions) {
      if (
        typeof position !== 'number' ||
        !Number.isSafeInteger(position) ||
        position < 0 ||
        position >= parsedSentences.length
      ) {
        throw new DictionaryParseError(
          `索引项 ${JSON.stringify(word)} 含非法位置 ${JSON.stringify(position)}`,
          path,
        );
      }
      if (list.includes(position)) {
        throw new DictionaryParseError(
          `索引项 ${JSON.stringify(word)} 含重复位置 ${position}`,
          path,
        );
      }
      list.push(position);
    }
    parsedIndices.push([word, list]);
  }

  return { sentences: parsedSentences, indices: Object.fromEntries(parsedIndices) };
}

/**
 * 读取词典文件；文件不存在时返回 undefined，由调用方决定是否新建。
 */
export function readDictionaryFile(path: string): DictionarySnapshot | undefined {
  let text: string;
  try {
    text = readFileSync(path, 'utf8');
  } catch (error) {
    if (isMissingFile(error)) return undefined;
    throw new DictionaryIOError(`读取词典文件失败: ${describeError(error)}`, path, error);
  }
  return parseDictionarySnapshot(text, path);
}

export function writeDictionaryFile(path: string, snapshot: DictionarySnapshot): void {
  const json = serializeDictionarySnapshot(snapshot, path);
  try {
    writeFileSync(path, json, 'utf8');
  } catch (error) {
    throw new DictionaryIOError(`写入词典文件失败: ${describeError(error)}`, path, error);
  }
}
