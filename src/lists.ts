/**
 * Named lists of entities. Each `EntryListMapping` row places one entity, by its
 * key, at a position in a list; lists of different entity types never share rows.
 */

import type { SqliteAdapter } from './adapter';
import { keyOf } from './command-builder';
import { Column, CreatedTimeColumn, Entity, Index, PrimaryColumn } from './decorators';
import { orderBy, predicateBuilder, type Predicate } from './predicate';
import { EntitySession } from './session';
import type { CallerInfo, MappingDescriptor } from './types';

@Entity('EntryListMapping')
export class ListEntry {
  @PrimaryColumn('EntityType', { order: 1, type: 'text' })
  entityType!: string;

  @PrimaryColumn('ListCacheKey', { order: 2, type: 'text' })
  listCacheKey!: string;

  @Index('IX_EntryListMapping_EntryCacheKey')
  @PrimaryColumn('EntryCacheKey', { order: 3, type: 'text' })
  entryCacheKey!: string;

  @Column('Position', { type: 'integer' })
  position!: number;

  @Column('CallerMember', { type: 'text', nullable: true })
  callerMember!: string | null;

  @CreatedTimeColumn()
  createdTime!: Date;
}

export class EntryLists {
  private readonly session: EntitySession<ListEntry>;

  constructor(adapter: SqliteAdapter, clock?: () => Date) {
    this.session = new EntitySession(ListEntry, adapter, { clock });
  }

  get descriptor(): MappingDescriptor {
    return this.session.descriptor;
  }

  has(entityType: string, listKey: string): boolean {
    return this.session.count(this.listFilter(entityType, listKey)) > 0;
  }

  /** Entry keys of one list, in list order. */
  entryKeys(entityType: string, listKey: string): string[] {
    return this.entries(entityType, listKey).map((entry) => entry.entryCacheKey);
  }

  /** Appends the keys after the list's current last position. */
  append(entityType: string, listKey: string, entryKeys: readonly string[], caller?: CallerInfo): void {
    const existing = this.entries(entityType, listKey);
    const start = existing.length > 0 ? existing[existing.length - 1].position + 1 : 0;
    entryKeys.forEach((entryKey, i) => {
      const entry = new ListEntry();
      entry.entityType = entityType;
      entry.listCacheKey = listKey;
      entry.entryCacheKey = entryKey;
      entry.position = start + i;
      entry.callerMember = caller?.member ?? null;
      this.session.create(entry);
    });
  }

  /** Removes every entry of the list and returns how many there were. */
  clear(entityType: string, listKey: string): number {
    const entries = this.entries(entityType, listKey);
    for (const entry of entries) {
      this.session.delete(keyOf(this.descriptor, entry));
    }
    return entries.length;
  }

  private entries(entityType: string, listKey: string): ListEntry[] {
    return this.session.query(this.listFilter(entityType, listKey), {
      orderBy: orderBy<ListEntry>('position'),
    });
  }

  private listFilter(entityType: string, listKey: string): Predicate {
    const p = predicateBuilder<ListEntry>();
    return p.and(p.eq('entityType', entityType), p.eq('listCacheKey', listKey));
  }
}
