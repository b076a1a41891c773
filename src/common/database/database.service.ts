import { Injectable, Logger } from '@nestjs/common';
import { DataSource } from 'typeorm';

import type { DbSession } from '../crud/crud.types';

/* 
Database Service - hands out one session per unit of work
*/
@Injectable()
export class DatabaseService {
  private readonly logger = new Logger(DatabaseService.name);

  // Tail of the queue of units of work waiting for the sqlite connection
  private exclusiveTail: Promise<void> = Promise.resolve();

  constructor(private readonly dataSource: DataSource) {}

  /*
  Whether units of work have to take turns on one shared connection
  */
  get isSingleConnection(): boolean {
    return this.dataSource.options.type === 'better-sqlite3';
  }

  /**
   * Run `work` with a session of its own. Whatever `work` leaves uncommitted
   * is rolled back, and the session is released on every exit path.
   *
   * On sqlite, calling `withSession` again from inside `work` queues behind
   * the running session and never starts. Pass the session down instead.
   */
  async withSession<T>(work: (session: DbSession) => Promise<T>): Promise<T> {
    if (!this.isSingleConnection) {
      return this.runSession(work);
    }

    // The sqlite driver shares a single query runner, so sessions run one at a time
    const run = this.exclusiveTail.then(() => this.runSession(work));
    // Failures surface through `run`; the queue itself only tracks completion
    this.exclusiveTail = run.then(
      () => undefined,
      () => undefined,
    );
    return run;
  }

  private async runSession<T>(
    work: (session: DbSession) => Promise<T>,
  ): Promise<T> {
    const session = this.dataSource.createQueryRunner();
    await session.connect();
    this.logger.debug('Session opened');

    try {
      return await work(session);
    } finally {
      try {
        if (session.isTransactionActive) {
          this.logger.warn('Rolling back uncommitted work');
          await session.rollbackTransaction();
        }
      } finally {
        await session.release();
        this.logger.debug('Session released');
      }
    }
  }
}
