import { SqliteAdapter } from './adapter';
import { AuditTrail } from './audit';
import { EntityManager } from './entity-manager';
import { ConcurrencyConflictError, OperationCancelledError } from './errors';
import { silentLogger } from './logger';
import { buildMapping } from './mapper';
import { RetryPolicy } from './retry-policy';
import { sqliteCompiler } from './sqlite-dialect';
import { EventLog, Item, Note, Order, OrderLine, makeItem, makeNote } from './test-entities';

const busy = (): Error => Object.assign(new Error('database is locked'), { code: 'SQLITE_BUSY' });

describe('EntityManager', () => {
  let adapter: SqliteAdapter;
  let audit: AuditTrail;
  let manager: EntityManager;
  let delay: jest.Mock<Promise<void>, [number, AbortSignal?]>;

  beforeEach(() => {
    adapter = new SqliteAdapter({ filename: ':memory:' });
    audit = new AuditTrail(adapter);
    const descriptors = [Item, Note, Order, OrderLine, EventLog].map((entity) => buildMapping(entity));
    for (const descriptor of descriptors) {
      adapter.exec(sqliteCompiler.generateCreateTableSql(descriptor));
    }
    adapter.exec(sqliteCompiler.generateCreateTableSql(audit.descriptor));

    delay = jest.fn<Promise<void>, [number, AbortSignal?]>().mockResolvedValue(undefined);
    manager = new EntityManager({
      adapter,
      audit,
      retry: new RetryPolicy({ maxAttempts: 3 }, { delay }),
      logger: silentLogger,
    });
  });

  afterEach(() => {
    adapter.close();
  });

  it('should commit work across entity types together', async () => {
    const order = new Order();
    order.id = 1;
    order.customer = 'Acme';
    order.placedAt = new Date('2026-02-01T09:00:00.000Z');
    const line = new OrderLine();
    line.orderId = 1;
    line.lineNo = 1;
    line.sku = 'SKU-1';
    line.quantity = 3;

    await manager.transaction(({ session }) => {
      session(Order).create(order);
      session(OrderLine).create(line);
    });

    expect(manager.session(OrderLine).get({ orderId: 1, lineNo: 1 })).toMatchObject({ quantity: 3, version: 1 });
  });

  it('should roll everything back when the work throws', async () => {
    await expect(
      manager.transaction(({ session }) => {
        session(Item).create(makeItem('i1', 'John Doe', 7));
        throw new Error('changed my mind');
      }),
    ).rejects.toThrow('changed my mind');

    expect(manager.session(Item).exists('i1')).toBe(false);
  });

  it('should roll back earlier writes when a later one conflicts', async () => {
    await manager.getRepository(Item).create(makeItem('i2', 'Jane Doe', 1));
    const stale = makeItem('i2', 'Stale', 0);
    stale.version = 4;

    await expect(
      manager.transaction(({ session }) => {
        session(Item).create(makeItem('i1', 'John Doe', 7));
        session(Item).update(stale);
      }),
    ).rejects.toBeInstanceOf(ConcurrencyConflictError);

    expect(manager.session(Item).count()).toBe(1);
    expect(delay).not.toHaveBeenCalled();
  });

  it('should re-run the whole unit after a transient failure', async () => {
    let calls = 0;

    const count = await manager.transaction(({ session }) => {
      calls += 1;
      session(Item).create(makeItem('i1', 'John Doe', 7));
      if (calls === 1) {
        throw busy();
      }
      return session(Item).count();
    });

    expect(count).toBe(1);
    expect(calls).toBe(2);
    expect(delay).toHaveBeenCalledTimes(1);
  });

  it('should retry a unit that updates an existing entity from its committed version', async () => {
    const item = makeItem('i1', 'John Doe', 1);
    await manager.getRepository(Item).create(item);
    let calls = 0;

    await manager.transaction(({ session }) => {
      calls += 1;
      item.value = 2;
      session(Item).update(item);
      if (calls === 1) {
        throw busy();
      }
    });

    expect(calls).toBe(2);
    expect(item.version).toBe(2);
    expect(manager.session(Item).get('i1')).toMatchObject({ value: 2, version: 2 });
  });

  it('should retry a unit that deletes an entity', async () => {
    await manager.getRepository(Note).create(makeNote('n1', 'Draft'));
    let calls = 0;

    await manager.transaction(({ session }) => {
      calls += 1;
      session(Note).delete('n1');
      if (calls === 1) {
        throw busy();
      }
    });

    expect(calls).toBe(2);
    expect(manager.session(Note).get('n1', { includeDeleted: true })).toMatchObject({ isDeleted: true, version: 2 });
    expect(audit.history('Note', 'n1').map((record) => record.operation)).toEqual(['CREATE', 'DELETE']);
  });

  it('should put the caller entity back as it was when the unit rolls back', async () => {
    const item = makeItem('i1', 'John Doe', 1);
    await manager.getRepository(Item).create(item);
    const written = item.lastWriteTime;

    await expect(
      manager.transaction(({ session }) => {
        item.value = 2;
        session(Item).update(item);
        throw new Error('abort');
      }),
    ).rejects.toThrow('abort');

    expect(item).toMatchObject({ value: 2, version: 1, lastWriteTime: written });
    expect(manager.session(Item).get('i1')).toMatchObject({ value: 1, version: 1 });

    await manager.transaction(({ session }) => {
      session(Item).update(item);
    });
    expect(manager.session(Item).get('i1')).toMatchObject({ value: 2, version: 2 });
  });

  it('should clear a generated key assigned by a rolled-back unit', async () => {
    const event = new EventLog();
    event.message = 'started';

    await expect(
      manager.transaction(({ session }) => {
        session(EventLog).create(event);
        expect(event.id).toBe(1);
        throw new Error('abort');
      }),
    ).rejects.toThrow('abort');

    expect(event.id).toBeUndefined();
    expect(manager.session(EventLog).count()).toBe(0);
  });

  it('should hand the caller to the work', async () => {
    await manager.transaction(
      ({ session, caller }) => {
        session(Note).create(makeNote('n1', 'Draft'), caller);
      },
      { caller: { userId: 'user-1', member: 'importNotes' } },
    );

    expect(audit.history('Note', 'n1')).toEqual([
      expect.objectContaining({ operation: 'CREATE', version: 1, userId: 'user-1', callerMember: 'importNotes' }),
    ]);
  });

  it('should not start cancelled work', async () => {
    const controller = new AbortController();
    controller.abort();
    const work = jest.fn();

    await expect(manager.transaction(work, { signal: controller.signal })).rejects.toBeInstanceOf(
      OperationCancelledError,
    );
    expect(work).not.toHaveBeenCalled();
  });

  it('should cache repositories and sessions per entity', () => {
    expect(manager.getRepository(Item)).toBe(manager.getRepository(Item));
    expect(manager.session(Item)).toBe(manager.session(Item));
    expect(manager.session(Item)).not.toBe(manager.session(Note));
  });
});
