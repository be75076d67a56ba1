export type DictionaryErrorKind = 'io' | 'parse' | 'serialize';

/**
 * 词典持久化错误基类
 *
 * `kind` 区分失败类型，调用方据此决定中止还是以空词典继续；核心内部不做重试。
 */
export class DictionaryError extends Error {
  constructor(
    message: string,
    public readonly kind: DictionaryErrorKind,
    public readonly path?: string,
    options?: { cause?: unknown },
  ) {
    super(message, options);
    this.name = 'DictionaryError';
  }
}

export class DictionaryIOError extends DictionaryError {
  constructor(message: string, path: string, cause?: unknown) {
    super(message, 'io', path, { cause });
    this.name = 'DictionaryIOError';
  }
}

export class DictionaryParseError extends DictionaryError {
  constructor(message: string, path?: string, cause?: unknown) {
    super(message, 'parse', path, { cause });
    this.name = 'DictionaryParseError';
  }
}

export class DictionarySerializeError extends DictionaryError {
  constructor(message: string, path?: string, cause?: unknown) {
    super(message, 'serialize', path, { cause });
    this.name = 'DictionarySerializeError';
  }
}

/**
 * 内部不变量被破坏（例如供体句子里找不到枢轴词）。不属于正常的“无回应”路径。
 */
export class InvariantViolationError extends Error {
  constructor(
    message: string,
    public readonly detail?: Record<string, unknown>,
  ) {
    super(message);
    this.name = 'InvariantViolationError';
  }
}
