// packages/shaper/src/describe.ts
// DESCRIBE TABLE output, rebuilt from the information_schema rows the rewritten
// statement returns.
import { z } from 'zod';
import type { NativeColumn } from '@frostbridge/core';
import { displayType } from '@frostbridge/typemap';
import { sourceDescriptor, type ColumnLengths } from './shape';

const Count = z.coerce.number().int().nullable().optional();

export const NativeDescribeRowSchema = z.object({
  name: z.string(),
  type: z.string(),
  nullable: z.union([z.enum(['YES', 'NO']), z.boolean()]),
  default: z.string().nullable().optional(),
  precision: Count,
  scale: Count
});

export type NativeDescribeRow = z.infer<typeof NativeDescribeRowSchema>;

export type DescribeRow = {
  name: string;
  type: string;
  kind: 'COLUMN';
  'null?': 'Y' | 'N';
  default: string | null;
  'primary key': 'N';
  'unique key': 'N';
  check: null;
  expression: null;
  comment: null;
  'policy name': null;
  'privacy domain': null;
};

const isNullable = (r: NativeDescribeRow): boolean => r.nullable === true || r.nullable === 'YES';

export const parseDescribeRows = (rows: readonly unknown[]): NativeDescribeRow[] =>
  rows.map((r) => NativeDescribeRowSchema.parse(r));

export function describeTable(rows: readonly NativeDescribeRow[], lengths: ColumnLengths = new Map()): DescribeRow[] {
  return rows.map((r) => ({
    name: r.name,
    type: displayType(sourceDescriptor(r.type, r.precision, r.scale, lengths.get(r.name))),
    kind: 'COLUMN',
    'null?': isNullable(r) ? 'Y' : 'N',
    default: r.default ?? null,
    'primary key': 'N',
    'unique key': 'N',
    check: null,
    expression: null,
    comment: null,
    'policy name': null,
    'privacy domain': null
  }));
}

/** The same rows as result-column metadata, for callers that shape a DESCRIBE target. */
export const describeColumns = (rows: readonly NativeDescribeRow[]): NativeColumn[] =>
  rows.map((r) => ({
    name: r.name,
    type: r.type,
    nullable: isNullable(r),
    ...(r.precision !== undefined ? { precision: r.precision } : {}),
    ...(r.scale !== undefined ? { scale: r.scale } : {})
  }));
