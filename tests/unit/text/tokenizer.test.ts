import { describe, expect, it } from 'vitest';

import { splitSentences, splitWords } from '@/text/tokenizer.js';

describe('分句', () => {
  it('仅在标点后跟空白处切分，无空白的标点串保持完整', () => {
    expect(splitSentences('Hi. This is a test. We.cant.split.this.')).toEqual([
      'Hi.',
      'This is a test.',
      'We.cant.split.this.',
    ]);
  });

  it('连续标点、冒号与网址', () => {
    expect(
      splitSentences(
        'Lol! A single sentence!!!! Look at this image: https://example.com/gallery/abc123',
      ),
    ).toEqual([
      'Lol!',
      'A single sentence!!!!',
      'Look at this image: https://example.com/gallery/abc123',
    ]);
  });

  it('去除首尾空白并丢弃空片段', () => {
    expect(splitSentences('  Hello there?\n\n  General Kenobi!  ')).toEqual([
      'Hello there?',
      'General Kenobi!',
    ]);
    expect(splitSentences('   ')).toEqual([]);
    expect(splitSentences('')).toEqual([]);
  });

  it('NEL (U+0085) 视为空白，BOM (U+FEFF) 不是', () => {
    expect(splitSentences('Hi.\u0085there')).toEqual(['Hi.', 'there']);
    expect(splitSentences('Hi.\ufeffthere')).toEqual(['Hi.\ufeffthere']);
    expect(splitSentences('\u0085Hello.\u0085')).toEqual(['Hello.']);
  });

  it('没有句末标点时整行为一句', () => {
    expect(splitSentences('no punctuation here at all')).toEqual(['no punctuation here at all']);
  });
});

describe('分词', () => {
  it('按 , . ! ? : 与空白的连续串切分', () => {
    expect(splitWords('...Hello world!!!!This is a test? I.am.a.test.')).toEqual([
      'Hello',
      'world',
      'This',
      'is',
      'a',
      'test',
      'I',
      'am',
      'a',
      'test',
    ]);
  });

  it('保留撇号、连字符等其它字符', () => {
    expect(splitWords("i've been doing fine today, what about you?")).toEqual([
      "i've",
      'been',
      'doing',
      'fine',
      'today',
      'what',
      'about',
      'you',
    ]);
    expect(splitWords('well-known: state-of-the-art')).toEqual(['well-known', 'state-of-the-art']);
  });

  it('按 Unicode 空白切分：NEL 切分，BOM 保留在词内', () => {
    expect(splitWords('a\u0085b')).toEqual(['a', 'b']);
    expect(splitWords('a\ufeffb')).toEqual(['a\ufeffb']);
    expect(splitWords('a\u3000b\u00a0c')).toEqual(['a', 'b', 'c']);
  });

  it('只有分隔符时返回空数组', () => {
    expect(splitWords(' ,.!?: ')).toEqual([]);
  });
});
