import { randomInt } from 'node:crypto';

/**
 * 随机数来源
 *
 * 每次 `next()` 返回一个非负安全整数。回应生成只通过它取随机数，
 * 注入确定性实现即可逐位复现回应。
 */
export interface RandomSource {
  next(): number;
}

// randomInt 要求 max - min <= 2^48 - 1
const CRYPTO_RANGE = 2 ** 48 - 1;

/**
 * 默认来源：`crypto.randomInt` 在 [0, 2^48 - 1) 上均匀取值
 */
export class CryptoRandomSource implements RandomSource {
  next(): number {
    return randomInt(0, CRYPTO_RANGE);
  }
}

/**
 * 等差序列：initial, initial + increment, initial + 2 * increment, ...
 */
export class StepRandomSource implements RandomSource {
  private current: number;

  constructor(
    initial: number,
    private readonly increment: number,
  ) {
    assertRandomValue(initial);
    assertRandomValue(increment);
    this.current = initial;
  }

  next(): number {
    const value = this.current;
    this.current += this.increment;
    return value;
  }
}

/**
 * 按给定顺序逐个返回；耗尽后抛错，避免测试静默复用数值
 */
export class SequenceRandomSource implements RandomSource {
  private cursor = 0;
  private readonly values: readonly number[];

  constructor(values: readonly number[]) {
    values.forEach(assertRandomValue);
    this.values = [...values];
  }

  get remaining(): number {
    return this.values.length - this.cursor;
  }

  next(): number {
    if (this.cursor >= this.values.length) {
      throw new RangeError(`随机序列已耗尽（共 ${this.values.length} 个值）`);
    }
    const value = this.values[this.cursor];
    this.cursor += 1;
    return value;
  }
}

export function assertRandomValue(value: number): void {
  if (!Number.isSafeInteger(value) || value < 0) {
    throw new RangeError(`随机值必须是非负安全整数，实际为 ${value}`);
  }
}

/**
 * 取一个元素：下标 = 随机值 mod 长度
 */
export function pickRandom<T>(items: readonly T[], random: RandomSource): T {
  if (items.length === 0) {
    throw new RangeError('无法从空列表中随机选取');
  }
  const value = random.next();
  assertRandomValue(value);
  return items[value % items.length];
}
