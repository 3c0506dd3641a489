/**
 * Audit trail: one `Audit` row per create, update and delete of an entity that
 * enables `auditTrail`, written in the same transaction as the change itself.
 */

import type { SqliteAdapter } from './adapter';
import { Column, CreatedTimeColumn, Entity, Index, PrimaryColumn } from './decorators';
import { orderBy, predicateBuilder } from './predicate';
import { EntitySession } from './session';
import type { CallerInfo, MappingDescriptor } from './types';

export type AuditOperation = 'CREATE' | 'UPDATE' | 'DELETE';

@Entity('Audit')
export class AuditRecord {
  @PrimaryColumn('Id', { autoIncrement: true, type: 'integer' })
  id!: number;

  @Index('IX_Audit_Entity', { order: 1 })
  @Column('EntityType', { type: 'text' })
  entityType!: string;

  @Index('IX_Audit_Entity', { order: 2 })
  @Column('EntityId', { type: 'text' })
  entityId!: string;

  @Column('Operation', { type: 'text' })
  operation!: AuditOperation;

  @Column('Version', { type: 'integer' })
  version!: number;

  @Column('OldVersion', { type: 'integer', nullable: true })
  oldVersion!: number | null;

  @Column('UserId', { type: 'text', nullable: true })
  userId!: string | null;

  @Column('CallerMember', { type: 'text', nullable: true })
  callerMember!: string | null;

  @CreatedTimeColumn()
  createdTime!: Date;
}

export interface AuditEntry {
  entityType: string;
  entityId: string;
  operation: AuditOperation;
  version: number;
  oldVersion?: number;
  caller?: CallerInfo;
}

export class AuditTrail {
  private readonly session: EntitySession<AuditRecord>;

  constructor(adapter: SqliteAdapter, clock?: () => Date) {
    this.session = new EntitySession(AuditRecord, adapter, { clock });
  }

  get descriptor(): MappingDescriptor {
    return this.session.descriptor;
  }

  record(entry: AuditEntry): AuditRecord {
    const record = new AuditRecord();
    record.entityType = entry.entityType;
    record.entityId = entry.entityId;
    record.operation = entry.operation;
    record.version = entry.version;
    record.oldVersion = entry.oldVersion ?? null;
    record.userId = entry.caller?.userId ?? null;
    record.callerMember = entry.caller?.member ?? null;
    return this.session.create(record);
  }

  /** Records for one entity, oldest first. */
  history(entityType: string, entityId: string): AuditRecord[] {
    const p = predicateBuilder<AuditRecord>();
    return this.session.query(p.and(p.eq('entityType', entityType), p.eq('entityId', entityId)), {
      orderBy: orderBy<AuditRecord>('id'),
    });
  }
}
