/**
 * 非同期ディスパッチャ
 * 投げっぱなしの送信タスクをワーカープールで実行する
 */

import os from 'os';
import type { Logger } from 'winston';
import { ReporterConfigError } from './errors.js';
import { createChildLogger } from './logger.js';

/**
 * 実行単位。戻り値は破棄される
 */
export type Task = () => unknown;

/**
 * 固定数のワーカーでタスクを並行実行するプール
 */
export class WorkerPool {
  private queue: Task[] = [];
  private active = 0;
  private closed = false;
  private idleWaiters: Array<() => void> = [];

  constructor(
    readonly concurrency: number,
    private readonly logger: Logger
  ) {}

  /**
   * 待機中と実行中のタスク数
   */
  get pending(): number {
    return this.queue.length + this.active;
  }

  get isShutdown(): boolean {
    return this.closed;
  }

  submit(task: Task): void {
    if (this.closed) {
      throw new Error('Cannot submit to a worker pool that has been shut down');
    }
    this.queue.push(task);
    this.pump();
  }

  /**
   * 受付を停止し、全タスクの完了を待つ
   */
  shutdown(): Promise<void> {
    this.closed = true;
    if (this.pending === 0) {
      return Promise.resolve();
    }
    return new Promise((resolve) => {
      this.idleWaiters.push(resolve);
    });
  }

  private pump(): void {
    while (this.active < this.concurrency) {
      const task = this.queue.shift();
      if (!task) {
        return;
      }
      this.run(task);
    }
  }

  private run(task: Task): void {
    this.active++;
    void Promise.resolve()
      .then(task)
      .catch((error: unknown) => {
        // タスクの失敗は投入側に伝えない。ワーカーは次のタスクへ進む
        this.logger.warn('Background task failed', {
          error: error instanceof Error ? error.message : String(error),
        });
      })
      .finally(() => {
        this.active--;
        this.pump();
        if (this.pending === 0) {
          this.notifyIdle();
        }
      });
  }

  private notifyIdle(): void {
    const waiters = this.idleWaiters;
    this.idleWaiters = [];
    waiters.forEach((resolve) => resolve());
  }
}

export interface AsyncDispatcherOptions {
  /** ワーカー数（デフォルト: 利用可能な並列度） */
  concurrency?: number;
  logger?: Logger;
}

export class AsyncDispatcher {
  private pool: WorkerPool;
  private draining: Promise<void>[] = [];
  private readonly concurrency: number;
  private readonly logger: Logger;

  constructor(options: AsyncDispatcherOptions = {}) {
    this.concurrency = options.concurrency ?? os.availableParallelism();
    if (!Number.isInteger(this.concurrency) || this.concurrency < 1) {
      throw new ReporterConfigError(`concurrency must be a positive integer, got ${this.concurrency}`);
    }
    this.logger = options.logger ?? createChildLogger('AsyncDispatcher');
    this.pool = this.createPool();
  }

  /**
   * タスクを投入してすぐに戻る。結果は呼び出し側に返らない
   */
  submit(task: Task): void {
    this.pool.submit(task);
  }

  /**
   * 投入済みのタスクがすべて終わるまで待ち、プールを入れ替える
   *
   * 入れ替えは待機の前に同期的に行うため、drain 中の submit は
   * 新しいプールで処理され、この drain の待機対象にはならない。
   * 先行する drain が待っているプールも待機対象に含める。
   */
  async drain(): Promise<void> {
    const previous = this.pool;
    this.pool = this.createPool();

    this.logger.debug('Draining worker pool', { pending: previous.pending });
    const shutdown = previous.shutdown();
    const waiting = [...this.draining, shutdown];
    this.draining.push(shutdown);

    try {
      await Promise.all(waiting);
    } finally {
      this.draining = this.draining.filter((entry) => entry !== shutdown);
    }
    this.logger.debug('Worker pool drained');
  }

  get pending(): number {
    return this.pool.pending;
  }

  private createPool(): WorkerPool {
    return new WorkerPool(this.concurrency, this.logger);
  }
}
