import { SqliteAdapter, toDriverBindings } from './adapter';
import { ConfigurationError } from './errors';

describe('toDriverBindings', () => {
  it('should strip the placeholder prefix', () => {
    expect(toDriverBindings({ '@Id': 'i1', '@p0': 3, plain: null })).toEqual({ Id: 'i1', p0: 3, plain: null });
  });
});

describe('SqliteAdapter', () => {
  let adapter: SqliteAdapter;

  beforeEach(() => {
    adapter = new SqliteAdapter({ filename: ':memory:' });
    adapter.exec('CREATE TABLE Items (Id TEXT PRIMARY KEY, Value INTEGER)');
  });

  afterEach(() => {
    if (adapter.open) adapter.close();
  });

  it('should run statements with named parameters', () => {
    expect(adapter.run('INSERT INTO Items (Id, Value) VALUES (@Id, @Value)', { '@Id': 'i1', '@Value': 7 })).toEqual({
      changes: 1,
      lastInsertRowid: 1,
    });
    expect(adapter.get('SELECT Id, Value FROM Items WHERE Id = @Id', { '@Id': 'i1' })).toEqual({ Id: 'i1', Value: 7 });
    expect(adapter.get('SELECT Id FROM Items WHERE Id = @Id', { '@Id': 'missing' })).toBeUndefined();
  });

  it('should run statements without parameters', () => {
    adapter.run(`INSERT INTO Items (Id, Value) VALUES ('a', 1)`);
    adapter.run(`INSERT INTO Items (Id, Value) VALUES ('b', 2)`);

    expect(adapter.all('SELECT Id FROM Items ORDER BY Id')).toEqual([{ Id: 'a' }, { Id: 'b' }]);
  });

  it('should roll back a failed transaction', () => {
    expect(() =>
      adapter.transaction(() => {
        adapter.run(`INSERT INTO Items (Id, Value) VALUES ('a', 1)`);
        throw new Error('rollback');
      }),
    ).toThrow('rollback');

    expect(adapter.all('SELECT Id FROM Items')).toEqual([]);
    expect(adapter.inTransaction).toBe(false);
  });

  it('should roll back only the inner unit of a nested transaction', () => {
    adapter.transaction(() => {
      adapter.run(`INSERT INTO Items (Id, Value) VALUES ('a', 1)`);
      expect(() =>
        adapter.transaction(() => {
          adapter.run(`INSERT INTO Items (Id, Value) VALUES ('b', 2)`);
          throw new Error('inner');
        }),
      ).toThrow('inner');
    });

    expect(adapter.all('SELECT Id FROM Items')).toEqual([{ Id: 'a' }]);
  });

  it('should apply a busy timeout for the duration of one call', () => {
    const during = adapter.withBusyTimeout(250, () => adapter.get('PRAGMA busy_timeout'));

    expect(during).toEqual({ timeout: 250 });
    expect(adapter.get('PRAGMA busy_timeout')).toEqual({ timeout: 5000 });
  });

  it('should restore the busy timeout when the call throws', () => {
    expect(() =>
      adapter.withBusyTimeout(250, () => {
        throw new Error('failed');
      }),
    ).toThrow('failed');

    expect(adapter.get('PRAGMA busy_timeout')).toEqual({ timeout: 5000 });
  });

  it('should reject invalid timeouts', () => {
    expect(() => adapter.withBusyTimeout(-1, () => undefined)).toThrow(ConfigurationError);
    expect(() => new SqliteAdapter({ filename: ':memory:', busyTimeoutMs: 1.5 })).toThrow(
      'Command timeout must be a non-negative integer of milliseconds, got 1.5.',
    );
  });

  it('should report existing tables', () => {
    expect(adapter.tableExists('Items')).toBe(true);
    expect(adapter.tableExists('Orders')).toBe(false);
  });

  it('should enforce foreign keys', () => {
    adapter.exec('CREATE TABLE Lines (ItemId TEXT NOT NULL REFERENCES Items (Id))');

    expect(() => adapter.run(`INSERT INTO Lines (ItemId) VALUES ('missing')`)).toThrow('FOREIGN KEY constraint failed');
  });

  it('should close the connection', () => {
    adapter.close();
    expect(adapter.open).toBe(false);
  });
});
