import { Injectable, Logger } from '@nestjs/common';
import { DataSource, EntityManager } from 'typeorm';

// Drivers that keep a single shared connection for every query runner.
const SINGLE_CONNECTION_DRIVERS = ['sqlite', 'better-sqlite3', 'sqljs'];

export type Work<T> = (manager: EntityManager) => Promise<T>;

/**
 * Runs a block of writes as one transaction. Either everything the block
 * wrote is committed or none of it is.
 */
@Injectable()
export class UnitOfWork {
  private readonly logger = new Logger(UnitOfWork.name);
  private queue: Promise<void> = Promise.resolve();

  constructor(private readonly dataSource: DataSource) {}

  run<T>(work: Work<T>): Promise<T> {
    if (!this.isSingleConnection()) {
      return this.dataSource.transaction(work);
    }

    // transactions on a shared connection must not interleave
    const result = this.queue.then(() => this.dataSource.transaction(work));
    this.queue = result.then(
      () => undefined,
      (err: unknown) => {
        // the caller receives the rejection through `result`
        this.logger.debug(
          `Queued transaction rolled back: ${err instanceof Error ? err.message : String(err)}`,
        );
      },
    );
    return result;
  }

  private isSingleConnection(): boolean {
    return SINGLE_CONNECTION_DRIVERS.includes(this.dataSource.options.type);
  }
}
