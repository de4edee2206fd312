// packages/shaper/test/shaper.spec.ts
import { describe, it, expect } from 'vitest';
import { TypeMappingError, type NativeColumn } from '@frostbridge/core';
import { SessionContext } from '@frostbridge/session';
import { describeColumns, describeTable, parseDescribeRows, shape } from '../src';

const session = new SessionContext({ database: 'd', schema: 's' });

const column = (name: string, type: string, extra: Partial<NativeColumn> = {}): NativeColumn => ({
  name,
  type,
  nullable: true,
  database: 'D',
  schema: 'S',
  table: 'T',
  ...extra
});

describe('shape', () => {
  it('synthesizes NUMBER(38,0) for integer columns', () => {
    expect(shape([column('ID', 'BIGINT', { nullable: false })], session)).toEqual([
      {
        name: 'ID',
        database: 'D',
        schema: 'S',
        table: 'T',
        nullable: false,
        type: 'fixed',
        displayType: 'NUMBER(38,0)',
        precision: 38,
        scale: 0,
        length: null,
        byteLength: null,
        collation: null
      }
    ]);
  });

  it('reads declared VARCHAR lengths from the extension map', () => {
    const [bounded, open] = shape([column('NAME', 'VARCHAR'), column('NOTE', 'VARCHAR')], session, new Map([['NAME', 10]]));
    expect([bounded.displayType, bounded.length, bounded.byteLength]).toEqual(['VARCHAR(10)', 10, 40]);
    expect([open.displayType, open.length, open.byteLength]).toEqual(['VARCHAR(16777216)', 16777216, 16777216]);
  });

  it('maps decimals, doubles and timestamps', () => {
    const out = shape(
      [column('AMOUNT', 'DECIMAL(10,2)'), column('RATIO', 'DOUBLE'), column('AT', 'TIMESTAMP'), column('TAGS', 'JSON[]')],
      session
    );
    expect(out.map((c) => [c.type, c.displayType, c.precision, c.scale])).toEqual([
      ['fixed', 'NUMBER(10,2)', 10, 2],
      ['real', 'FLOAT', null, null],
      ['timestamp_ntz', 'TIMESTAMP_NTZ(9)', 0, 9],
      ['array', 'ARRAY', null, null]
    ]);
  });

  it('fills the namespace from the session only for table columns', () => {
    const [tabled, computed] = shape(
      [
        { name: 'A', type: 'INTEGER', nullable: true, table: 'T' },
        { name: 'B', type: 'INTEGER', nullable: true }
      ],
      session
    );
    expect([tabled.database, tabled.schema, tabled.table]).toEqual(['D', 'S', 'T']);
    expect([computed.database, computed.schema, computed.table]).toEqual(['', '', '']);
  });

  it('rejects native types with no source name', () => {
    expect(() => shape([column('G', 'GEOMETRY')], session)).toThrow(TypeMappingError);
  });
});

describe('describeTable', () => {
  const rows = parseDescribeRows([
    { name: 'ID', type: 'BIGINT', nullable: 'NO', default: null, precision: 64, scale: 0 },
    { name: 'NAME', type: 'VARCHAR', nullable: 'YES', default: "'n/a'", precision: null, scale: null },
    { name: 'AMOUNT', type: 'DECIMAL(10,2)', nullable: 'YES', default: null, precision: 10, scale: 2 }
  ]);

  it('prints source types and flags', () => {
    const out = describeTable(rows, new Map([['NAME', 20]]));
    expect(out.map((r) => [r.name, r.type, r['null?'], r.default])).toEqual([
      ['ID', 'NUMBER(38,0)', 'N', null],
      ['NAME', 'VARCHAR(20)', 'Y', "'n/a'"],
      ['AMOUNT', 'NUMBER(10,2)', 'Y', null]
    ]);
    expect(out[0]).toMatchObject({ kind: 'COLUMN', 'primary key': 'N', 'unique key': 'N', check: null, 'privacy domain': null });
  });

  it('agrees with shape on every type string', () => {
    const lengths = new Map([['NAME', 20]]);
    const described = describeTable(rows, lengths).map((r) => r.type);
    const shaped = shape(describeColumns(rows), session, lengths).map((c) => c.displayType);
    expect(described).toEqual(shaped);
  });

  it('rejects rows without a type', () => {
    expect(() => parseDescribeRows([{ name: 'X', nullable: 'YES' }])).toThrow();
  });
});
