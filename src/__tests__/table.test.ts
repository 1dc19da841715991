/**
 * Table and CSV Helper Tests
 */

import { describe, it, expect } from 'vitest';
import { toCsv, escapeField } from '../csv';
import { column, flattenRecord, maxOf, snakeCaseKeys, toSnakeCase, toTable } from '../table';

describe('toSnakeCase', () => {
  it.each([
    ['uploadedAt', 'uploaded_at'],
    ['firstOfInception', 'first_of_inception'],
    ['HTTPStatus', 'http_status'],
    ['private_arenaScore', 'private_arena_score'],
    ['moons-duration', 'moons_duration'],
    ['round2Id', 'round2_id'],
    ['id', 'id'],
  ])('%s -> %s', (input, expected) => {
    expect(toSnakeCase(input)).toBe(expected);
  });

  it('should convert every key of a record', () => {
    expect(snakeCaseKeys({ roundId: 1, live: true })).toEqual({ round_id: 1, live: true });
  });
});

describe('flattenRecord', () => {
  it('should lift merged objects and prefix the others', () => {
    const row = flattenRecord(
      {
        id: 9,
        createdAt: '2024-01-01',
        owner: { id: 3, name: 'bob' },
        score: { mean: 0.5 },
      },
      {
        merged: ['owner'],
        prefixed: ['score'],
        renames: { owner: { id: 'ownerId' } },
      }
    );
    expect(row).toEqual({
      owner_id: 3,
      name: 'bob',
      score_mean: 0.5,
      id: 9,
      created_at: '2024-01-01',
    });
  });

  it('should drop configured keys', () => {
    const row = flattenRecord({ id: 1, userId: 2, crunch: { id: 5, number: 3 } }, {
      merged: ['crunch'],
      drop: { '': ['userId'], crunch: ['id'] },
      renames: { crunch: { number: 'crunchNumber' } },
    });
    expect(row).toEqual({ crunch_number: 3, id: 1 });
  });

  it('should let top-level fields win over merged ones', () => {
    const row = flattenRecord({ id: 1, user: { id: 2 } }, { merged: ['user'] });
    expect(row.id).toBe(1);
  });

  it('should serialize other nested values as JSON and map undefined to null', () => {
    const row = flattenRecord({ tags: ['a', 'b'], periods: { red: 'P30D' }, missing: undefined });
    expect(row).toEqual({ tags: '["a","b"]', periods: '{"red":"P30D"}', missing: null });
  });
});

describe('toTable', () => {
  it('should collect columns in first-seen order after the leading ones', () => {
    const table = toTable([{ b: 1, id: 1 }, { id: 2, c: 'x' }], ['id']);
    expect(table.columns).toEqual(['id', 'b', 'c']);
  });

  it('should fill missing cells with null', () => {
    const table = toTable([{ id: 1, b: 1 }, { id: 2 }], ['id']);
    expect(table.rows[1]).toEqual({ id: 2, b: null });
  });

  it('should fill columns named after inherited properties', () => {
    const table = toTable<Record<string, unknown>>([{ id: 1, constructor: 'x' }, { id: 2 }], ['id']);
    expect(table.columns).toEqual(['id', 'constructor']);
    expect(Object.hasOwn(table.rows[1], 'constructor')).toBe(true);
    expect(table.rows[1]).toEqual({ id: 2, constructor: null });
  });

  it('should build an empty table', () => {
    expect(toTable([], ['id'])).toEqual({ columns: ['id'], rows: [] });
  });
});

describe('column and maxOf', () => {
  const table = {
    columns: ['id', 'crunch_number'],
    rows: [
      { id: 1, crunch_number: 3 },
      { id: 2, crunch_number: 7 },
      { id: 3, crunch_number: null },
    ],
  };

  it('should read one column', () => {
    expect(column(table, 'id')).toEqual([1, 2, 3]);
  });

  it('should find the largest number and skip non-numbers', () => {
    expect(maxOf(table, 'crunch_number')).toBe(7);
  });

  it('should return undefined for an empty table', () => {
    expect(maxOf({ columns: ['x'], rows: [] }, 'x')).toBeUndefined();
  });
});

describe('toCsv', () => {
  it('should write a header and one line per row in column order', () => {
    const csv = toCsv({
      columns: ['id', 'target'],
      rows: [
        { target: 0.25, id: 'a1' },
        { target: 0.75, id: 'a2' },
      ],
    });
    expect(csv).toBe('id,target\na1,0.25\na2,0.75\n');
  });

  it('should quote fields with commas, quotes or newlines', () => {
    const csv = toCsv({
      columns: ['id', 'note'],
      rows: [{ id: 'a,1', note: 'say "hi"' }],
    });
    expect(csv).toBe('id,note\n"a,1","say ""hi"""\n');
  });

  it('should leave plain fields alone', () => {
    expect(escapeField(12)).toBe('12');
    expect(escapeField('line\nbreak')).toBe('"line\nbreak"');
  });
});
