// =======================
// 核心导出
// =======================

export { BabbleBot } from './babbleBot.js';
export type { BabbleBotStats } from './babbleBot.js';

export { Dictionary } from './storage/dictionary.js';
export type { Indices, DictionarySnapshot } from './storage/dictionary.js';

export { respondTo, wordsLeftOfPivot, wordsRightOfPivotInclusive } from './response/generator.js';
export { splitSentences, splitWords } from './text/tokenizer.js';

// =======================
// 随机数来源
// =======================

export {
  CryptoRandomSource,
  StepRandomSource,
  SequenceRandomSource,
  pickRandom,
  assertRandomValue,
} from './random/randomSource.js';
export type { RandomSource } from './random/randomSource.js';

// =======================
// 持久化与错误
// =======================

export {
  parseDictionarySnapshot,
  serializeDictionarySnapshot,
  readDictionaryFile,
  writeDictionaryFile,
} from './storage/persistence.js';
export {
  DictionaryError,
  DictionaryIOError,
  DictionaryParseError,
  DictionarySerializeError,
  InvariantViolationError,
} from './storage/errors.js';
export type { DictionaryErrorKind } from './storage/errors.js';

// =======================
// 配置与选项
// =======================

export type { BabbleBotOpenOptions } from './types/openOptions.js';
export { isBabbleBotOpenOptions, assertBabbleBotOpenOptions } from './types/openOptions.js';
