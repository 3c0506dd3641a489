import { UnsupportedExpressionError } from './errors';
import {
  translateCount,
  translateOrderBy,
  translatePredicate,
  translateSelect,
} from './expression-translator';
import { buildMapping } from './mapper';
import { field, literal, orderBy, predicateBuilder, type Predicate } from './predicate';
import { CacheEntry, Item, Note, Order } from './test-entities';

const ITEM_SELECT = 'SELECT Id, Name, Value, Version, CreatedTime, LastWriteTime FROM Items';

describe('translatePredicate', () => {
  const items = buildMapping(Item);
  const p = predicateBuilder<Item>();

  it('should translate equality into a parameterized comparison', () => {
    expect(translatePredicate(items, p.eq('name', 'John Doe'))).toEqual({
      sql: '(Name = @p0)',
      parameters: { '@p0': 'John Doe' },
    });
  });

  it('should translate contains into LIKE with wildcards on both sides', () => {
    expect(translatePredicate(items, p.contains('name', 'Smith'))).toEqual({
      sql: '(Name LIKE @p0)',
      parameters: { '@p0': '%Smith%' },
    });
  });

  it('should anchor startsWith and endsWith patterns', () => {
    expect(translatePredicate(items, p.startsWith('name', 'Jo')).parameters).toEqual({ '@p0': 'Jo%' });
    expect(translatePredicate(items, p.endsWith('name', 'oe')).parameters).toEqual({ '@p0': '%oe' });
  });

  it('should number parameters in walk order across nested nodes', () => {
    const predicate = p.or(p.and(p.contains('name', 'Smith'), p.gt('value', 10)), p.not(p.eq('id', 'x')));

    expect(translatePredicate(items, predicate)).toEqual({
      sql: '(((Name LIKE @p0) AND (Value > @p1)) OR (NOT (Id = @p2)))',
      parameters: { '@p0': '%Smith%', '@p1': 10, '@p2': 'x' },
    });
  });

  it('should give every literal occurrence its own parameter', () => {
    const predicate = p.or(p.eq('value', 5), p.eq('value', 5));

    expect(translatePredicate(items, predicate)).toEqual({
      sql: '((Value = @p0) OR (Value = @p1))',
      parameters: { '@p0': 5, '@p1': 5 },
    });
  });

  it('should unwrap a single-operand conjunction', () => {
    expect(translatePredicate(items, p.and(p.le('value', 3))).sql).toBe('(Value <= @p0)');
  });

  it('should translate null comparisons into IS NULL tests', () => {
    expect(translatePredicate(items, p.eq('name', null))).toEqual({ sql: '(Name IS NULL)', parameters: {} });
    expect(translatePredicate(items, p.ne('name', null)).sql).toBe('(Name IS NOT NULL)');
    expect(translatePredicate(items, p.isNull('name')).sql).toBe('(Name IS NULL)');
    expect(translatePredicate(items, p.isNotNull('name')).sql).toBe('(Name IS NOT NULL)');
  });

  it('should translate membership tests', () => {
    expect(translatePredicate(items, p.in('value', [1, 2, 3]))).toEqual({
      sql: '(Value IN (@p0, @p1, @p2))',
      parameters: { '@p0': 1, '@p1': 2, '@p2': 3 },
    });
  });

  it('should compare datetime columns as points in time', () => {
    const orders = buildMapping(Order);
    const o = predicateBuilder<Order>();

    expect(translatePredicate(orders, o.gt('placedAt', new Date('2026-01-01T00:00:00.000Z')))).toEqual({
      sql: '(datetime(PlacedAt) > datetime(@p0))',
      parameters: { '@p0': '2026-01-01T00:00:00.000Z' },
    });
    expect(translatePredicate(orders, o.compareFields('lastWriteTime', 'gt', 'createdTime')).sql).toBe(
      '(datetime(LastWriteTime) > datetime(CreatedTime))',
    );
  });

  it('should convert literals to the storage form of the compared column', () => {
    const o = predicateBuilder<Order>();
    expect(translatePredicate(buildMapping(Order), o.eq('paid', true)).parameters).toEqual({ '@p0': 1 });
  });

  it('should quote reserved column names', () => {
    const c = predicateBuilder<CacheEntry>();
    expect(translatePredicate(buildMapping(CacheEntry), c.eq('key', 'k1')).sql).toBe('("Key" = @p0)');
  });

  it('should accept hand-built trees with literals on the left', () => {
    const predicate: Predicate = { kind: 'compare', op: 'lt', left: literal(3), right: field('value') };
    expect(translatePredicate(items, predicate)).toEqual({ sql: '(@p0 < Value)', parameters: { '@p0': 3 } });
  });

  it('should yield an empty fragment without a predicate', () => {
    expect(translatePredicate(items, undefined)).toEqual({ sql: '', parameters: {} });
    expect(translatePredicate(items, null)).toEqual({ sql: '', parameters: {} });
  });

  it('should be deterministic', () => {
    const predicate = p.and(p.contains('name', 'a'), p.in('value', [1, 2]));
    expect(translatePredicate(items, predicate)).toEqual(translatePredicate(items, predicate));
  });

  describe('unsupported shapes', () => {
    const nodeKindOf = (run: () => unknown): string | undefined => {
      try {
        run();
      } catch (error) {
        if (error instanceof UnsupportedExpressionError) return error.nodeKind;
        throw error;
      }
      return undefined;
    };

    it('should reject unmapped properties', () => {
      const predicate: Predicate = { kind: 'compare', op: 'eq', left: field('missing'), right: literal(1) };
      expect(nodeKindOf(() => translatePredicate(items, predicate))).toBe('compare');
    });

    it('should reject ordering comparisons with null', () => {
      expect(nodeKindOf(() => translatePredicate(items, p.lt('value', null)))).toBe('compare');
    });

    it('should reject string matching on non-text columns', () => {
      expect(nodeKindOf(() => translatePredicate(items, p.contains('value', '1')))).toBe('stringMatch');
    });

    it('should reject empty conjunctions and empty IN lists', () => {
      expect(nodeKindOf(() => translatePredicate(items, p.and()))).toBe('and');
      expect(nodeKindOf(() => translatePredicate(items, p.or()))).toBe('or');
      expect(nodeKindOf(() => translatePredicate(items, p.in('value', [])))).toBe('in');
    });

    it('should reject null members of an IN list', () => {
      expect(nodeKindOf(() => translatePredicate(items, p.in('value', [1, null])))).toBe('in');
    });

    it('should reject operators inherited from Object', () => {
      const inherited: Predicate = JSON.parse(
        '{"kind":"compare","op":"toString","left":{"kind":"field","name":"value"},"right":{"kind":"literal","value":1}}',
      );
      expect(nodeKindOf(() => translatePredicate(items, inherited))).toBe('compare');
    });

    it('should reject node kinds it does not know', () => {
      const untrusted: Predicate = JSON.parse('{"kind":"regex","pattern":".*"}');
      expect(nodeKindOf(() => translatePredicate(items, untrusted))).toBe('regex');
    });
  });
});

describe('translateOrderBy', () => {
  const items = buildMapping(Item);

  it('should list keys in order with their directions', () => {
    expect(translateOrderBy(items, orderBy<Item>('name').thenByDescending('value'))).toBe(
      'ORDER BY Name ASC, Value DESC',
    );
  });

  it('should yield nothing without keys', () => {
    expect(translateOrderBy(items, undefined)).toBe('');
  });

  it('should reject keys that are not mapped on the entity', () => {
    expect(() => translateOrderBy(items, orderBy<Order>('customer'))).toThrow(UnsupportedExpressionError);
  });
});

describe('translateSelect', () => {
  const items = buildMapping(Item);
  const p = predicateBuilder<Item>();

  it('should compose the select list, filter and ordering', () => {
    expect(
      translateSelect(items, p.eq('name', 'John Doe'), { orderBy: orderBy<Item>('name'), limit: 10 }),
    ).toEqual({
      sql: `${ITEM_SELECT} WHERE (Name = @p0) ORDER BY Name ASC LIMIT 10`,
      parameters: { '@p0': 'John Doe' },
    });
  });

  it('should emit LIMIT -1 when only an offset is given', () => {
    expect(translateSelect(items, undefined, { offset: 5 }).sql).toBe(`${ITEM_SELECT} LIMIT -1 OFFSET 5`);
    expect(translateSelect(items, undefined, { limit: 10, offset: 20 }).sql).toBe(
      `${ITEM_SELECT} LIMIT 10 OFFSET 20`,
    );
  });

  it('should reject negative or fractional paging values', () => {
    expect(() => translateSelect(items, undefined, { limit: -1 })).toThrow(UnsupportedExpressionError);
    expect(() => translateSelect(items, undefined, { offset: 1.5 })).toThrow(UnsupportedExpressionError);
  });

  it('should hide soft-deleted rows unless asked for them', () => {
    const notes = buildMapping(Note);
    const n = predicateBuilder<Note>();
    const select = 'SELECT Id, Title, Body, Version, CreatedTime, LastWriteTime, IsDeleted FROM Notes';

    expect(translateSelect(notes, undefined).sql).toBe(`${select} WHERE IsDeleted = 0`);
    expect(translateSelect(notes, n.eq('title', 'a')).sql).toBe(`${select} WHERE (Title = @p0) AND IsDeleted = 0`);
    expect(translateSelect(notes, undefined, { includeDeleted: true }).sql).toBe(select);
  });

  it('should hide expired rows unless asked for them', () => {
    const entries = buildMapping(CacheEntry);
    const select =
      'SELECT "Key", Payload, Version, CreatedTime, LastWriteTime, AbsoluteExpiration FROM CacheEntries';

    expect(translateSelect(entries, undefined).sql).toBe(
      `${select} WHERE (AbsoluteExpiration IS NULL OR datetime(AbsoluteExpiration) > datetime('now'))`,
    );
    expect(translateSelect(entries, undefined, { includeExpired: true }).sql).toBe(select);
  });
});

describe('translateCount', () => {
  it('should count with the same filters as a select', () => {
    const n = predicateBuilder<Note>();
    expect(translateCount(buildMapping(Note), n.contains('title', 'x'))).toEqual({
      sql: 'SELECT COUNT(*) AS count FROM Notes WHERE (Title LIKE @p0) AND IsDeleted = 0',
      parameters: { '@p0': '%x%' },
    });
  });
});
