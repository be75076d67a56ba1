/**
 * 分句与分词
 *
 * 两个纯函数，规则固定：
 * - 句子边界：`. ! ?` 之后紧跟空白处切分，标点本身保留在前一句末尾；
 *   没有空白的标点串（网址、缩写、`a.b.c.`）不会被切开。
 * - 词边界：`, . ! ? :` 或空白的最长连续串。
 *
 * 空白按 Unicode White_Space 属性：含 U+0085，不含 U+FEFF（JS 的 `\s` 恰好相反）。
 *
 * 大小写不在这里处理，建索引/查询前由调用方统一转小写。
 */

const WHITESPACE = '\\t-\\r \\u0085\\u00a0\\u1680\\u2000-\\u200a\\u2028\\u2029\\u202f\\u205f\\u3000';

const SENTENCE_BOUNDARY = new RegExp(`(?<=[.!?])[${WHITESPACE}]+`);
const WORD_DELIMITERS = new RegExp(`[,.!?:${WHITESPACE}]+`);
const SURROUNDING_WHITESPACE = new RegExp(`^[${WHITESPACE}]+|[${WHITESPACE}]+$`, 'g');

export function splitSentences(text: string): string[] {
  return text
    .split(SENTENCE_BOUNDARY)
    .map((segment) => segment.replace(SURROUNDING_WHITESPACE, ''))
    .filter((segment) => segment.length > 0);
}

export function splitWords(text: string): string[] {
  return text.split(WORD_DELIMITERS).filter((word) => word.length > 0);
}
