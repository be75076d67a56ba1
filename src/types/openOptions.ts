import type { RandomSource } from '../random/randomSource.js';

/**
 * BabbleBot 打开选项
 *
 * 控制机器人打开词典后的行为。词典路径本身作为 `BabbleBot.open` 的第一个参数传入。
 */
export interface BabbleBotOpenOptions {
  /**
   * 是否重建索引
   *
   * 为 true 时，打开后无条件重排句子并从头建立倒排索引。
   * 索引缺失（有句子但索引为空）时无论此项如何都会重建。
   *
   * @default false
   * @warning 重建会改变句子位置
   */
  rebuildIndexes?: boolean;

  /**
   * 是否学习
   *
   * 为 false 时 `learn` / `converse` 不再写入新句子，只基于已有词典回应。
   *
   * @default true
   */
  learning?: boolean;

  /**
   * 回应率
   *
   * `converse` 时回应的概率，取值 [0, 1]。小于 1 时每次对话会额外消耗一次随机数。
   *
   * @default 1
   * @example 0.3
   */
  replyRate?: number;

  /**
   * 随机数来源
   *
   * 未指定时使用 `CryptoRandomSource`。测试中注入 `StepRandomSource` 或
   * `SequenceRandomSource` 以获得可复现的回应。
   */
  random?: RandomSource;
}

/**
 * 判断输入是否符合 BabbleBot 打开选项的基本约束
 */
export function isBabbleBotOpenOptions(value: unknown): value is BabbleBotOpenOptions {
  if (value === null || typeof value !== 'object') {
    return false;
  }

  const options: Record<string, unknown> = { ...value };

  const ensureOptionalBoolean = (key: keyof BabbleBotOpenOptions): boolean => {
    if (!(key in options) || options[key] === undefined) return true;
    return typeof options[key] === 'boolean';
  };

  if (!ensureOptionalBoolean('rebuildIndexes')) {
    return false;
  }

  if (!ensureOptionalBoolean('learning')) {
    return false;
  }

  if ('replyRate' in options && options.replyRate !== undefined) {
    const rate = options.replyRate;
    if (typeof rate !== 'number' || !Number.isFinite(rate) || rate < 0 || rate > 1) {
      return false;
    }
  }

  if ('random' in options && options.random !== undefined) {
    const random = options.random;
    if (random === null || typeof random !== 'object') {
      return false;
    }
    if (!('next' in random) || typeof random.next !== 'function') {
      return false;
    }
  }

  return true;
}

/**
 * 断言输入符合 BabbleBot 打开选项要求
 */
export function assertBabbleBotOpenOptions(
  value: unknown,
  message?: string,
): asserts value is BabbleBotOpenOptions {
  if (!isBabbleBotOpenOptions(value)) {
    throw new TypeError(message ?? 'BabbleBot 打开选项格式错误');
  }
}
