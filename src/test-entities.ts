/**
 * Entities shared by the tests.
 */

import { BaseEntity } from './base-entity';
import { Column, Entity, ForeignKey, Index, PrimaryColumn } from './decorators';

@Entity('Items')
export class Item extends BaseEntity {
  @PrimaryColumn('Id')
  id!: string;

  @Column('Name', { size: 100 })
  name!: string;

  @Column('Value')
  value!: number;
}

@Entity('Notes', { softDelete: true, auditTrail: true })
export class Note extends BaseEntity {
  @PrimaryColumn('Id')
  id!: string;

  @Column('Title')
  title!: string;

  @Column('Body', { type: 'text', nullable: true })
  body!: string | null;
}

@Entity('CacheEntries', { expiry: { afterMs: 60_000 } })
export class CacheEntry extends BaseEntity {
  @PrimaryColumn('Key')
  key!: string;

  @Column('Payload', { type: 'json' })
  payload!: Record<string, unknown>;
}

@Entity('Orders')
export class Order extends BaseEntity {
  @PrimaryColumn('Id')
  id!: number;

  @Index('IX_Orders_Customer')
  @Column('Customer')
  customer!: string;

  @Column('PlacedAt')
  placedAt!: Date;

  @Column('Paid', { default: false })
  paid!: boolean;
}

@Entity('OrderLines')
export class OrderLine extends BaseEntity {
  @ForeignKey(() => Order, { onDelete: 'cascade' })
  @PrimaryColumn('OrderId', { order: 1 })
  orderId!: number;

  @PrimaryColumn('LineNo', { order: 2 })
  lineNo!: number;

  @Column('Sku')
  sku!: string;

  @Column('Quantity')
  quantity!: number;
}

/** Grouped into named lists. */
@Entity('Tasks', { softDelete: true, lists: true })
export class Task extends BaseEntity {
  @PrimaryColumn('Id')
  id!: string;

  @Column('Title')
  title!: string;
}

/** No version column and a generated key. */
@Entity('Events')
export class EventLog {
  @PrimaryColumn('Id', { autoIncrement: true })
  id!: number;

  @Column('Message')
  message!: string;
}

export function makeItem(id: string, name: string, value: number): Item {
  const item = new Item();
  item.id = id;
  item.name = name;
  item.value = value;
  return item;
}

export function makeTask(id: string, title: string): Task {
  const task = new Task();
  task.id = id;
  task.title = title;
  return task;
}

export function makeNote(id: string, title: string, body: string | null = null): Note {
  const note = new Note();
  note.id = id;
  note.title = title;
  note.body = body;
  return note;
}
