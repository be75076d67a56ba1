import { Dictionary } from './storage/dictionary.js';
import {
  CryptoRandomSource,
  assertRandomValue,
  type RandomSource,
} from './random/randomSource.js';
import { assertBabbleBotOpenOptions, type BabbleBotOpenOptions } from './types/openOptions.js';

export interface BabbleBotStats {
  sentences: number;
  words: number;
}

/**
 * BabbleBot - 基于句子拼接的对话机器人
 *
 * 持有一个词典、一个随机数来源以及学习/回应开关。聊天协议接入方只需要把收到的
 * 文本行交给 `converse`，再把返回的字符串（若有）发回去。
 *
 * 持久化由调用方决定时机：`flush()` 才会写盘。
 *
 * @example
 * ```typescript
 * const bot = BabbleBot.open('/path/to/brain.json', { replyRate: 0.5 });
 *
 * const reply = bot.converse('Hey there, everyone!');
 * if (reply !== undefined) send(reply);
 *
 * bot.flush();
 * ```
 */
export class BabbleBot {
  private constructor(
    private readonly path: string,
    private readonly dictionary: Dictionary,
    private readonly random: RandomSource,
    private readonly learning: boolean,
    private readonly replyRate: number,
  ) {}

  /**
   * 打开或创建词典，必要时重建索引
   */
  static open(path: string, options: BabbleBotOpenOptions = {}): BabbleBot {
    assertBabbleBotOpenOptions(options);

    const dictionary = Dictionary.load(path);
    if (options.rebuildIndexes || dictionary.needsIndexRebuild()) {
      console.warn(`[BabbleBot] 正在重建索引（${dictionary.sentenceCount} 条句子）: ${path}`);
      dictionary.rebuildIndices();
    }

    return new BabbleBot(
      path,
      dictionary,
      options.random ?? new CryptoRandomSource(),
      options.learning ?? true,
      options.replyRate ?? 1,
    );
  }

  learn(line: string): boolean {
    if (!this.learning) {
      return false;
    }
    return this.dictionary.learn(line);
  }

  respondTo(line: string): string | undefined {
    return this.dictionary.respondTo(line, this.random);
  }

  /**
   * 一轮对话：先按回应率决定是否回应（基于学习前的词典），再学习这一行
   */
  converse(line: string): string | undefined {
    let reply: string | undefined;
    if (this.shouldReply()) {
      reply = this.respondTo(line);
    }
    this.learn(line);
    return reply;
  }

  rebuildIndices(): void {
    this.dictionary.rebuildIndices();
  }

  flush(): void {
    this.dictionary.writeToDisk(this.path);
  }

  getPath(): string {
    return this.path;
  }

  getDictionary(): Dictionary {
    return this.dictionary;
  }

  getStats(): BabbleBotStats {
    return {
      sentences: this.dictionary.sentenceCount,
      words: this.dictionary.wordCount,
    };
  }

  private shouldReply(): boolean {
    if (this.replyRate >= 1) return true;
    if (this.replyRate <= 0) return false;
    const value = this.random.next();
    assertRandomValue(value);
    return value % 100 < this.replyRate * 100;
  }
}
