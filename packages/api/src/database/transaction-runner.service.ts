import { Injectable } from '@nestjs/common';
import { Mutex } from 'async-mutex';
import { DataSource, EntityManager } from 'typeorm';

/**
 * Runs store work one transaction at a time. The better-sqlite3 driver shares
 * a single query runner, so overlapping `DataSource.transaction` calls would
 * otherwise land in the same SQLite transaction.
 */
@Injectable()
export class TransactionRunner {
  private readonly mutex = new Mutex();

  constructor(private readonly dataSource: DataSource) {}

  run<T>(work: (manager: EntityManager) => Promise<T>): Promise<T> {
    return this.mutex.runExclusive(() => this.dataSource.transaction(work));
  }

  /** Holds the lock for work that manages its own transactions, such as migrations. */
  exclusive<T>(work: (dataSource: DataSource) => Promise<T>): Promise<T> {
    return this.mutex.runExclusive(() => work(this.dataSource));
  }
}
