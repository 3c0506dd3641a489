import { CreatedTimeColumn, LastWriteTimeColumn, VersionColumn } from './decorators';

/**
 * Optional base class carrying the concurrency token and both timestamps.
 * Entities may instead declare these columns themselves.
 */
export abstract class BaseEntity {
  @VersionColumn()
  version!: number;

  @CreatedTimeColumn()
  createdTime!: Date;

  @LastWriteTimeColumn()
  lastWriteTime!: Date;
}
