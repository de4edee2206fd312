// packages/shaper/src/shape.ts
import type { NativeColumn, TypeDescriptor } from '@frostbridge/core';
import type { SessionContext } from '@frostbridge/session';
import { describeWireType, displayType, fromTarget, type WireType } from '@frostbridge/typemap';

/** Declared lengths by column name, as the extension store returns them. */
export type ColumnLengths = ReadonlyMap<string, number>;

export interface SourceColumnMetadata {
  name: string;
  database: string;
  schema: string;
  table: string;
  nullable: boolean;
  type: WireType;
  displayType: string;
  precision: number | null;
  scale: number | null;
  length: number | null;
  byteLength: number | null;
  collation: string | null;
}

/**
 * The one place a native type becomes a source descriptor. DESCRIBE and
 * result metadata both go through here.
 */
export function sourceDescriptor(
  type: string,
  precision: number | null | undefined,
  scale: number | null | undefined,
  length: number | undefined
): TypeDescriptor {
  return fromTarget(type, { precision, scale, characterLength: length });
}

export function shape(columns: readonly NativeColumn[], session: SessionContext, lengths: ColumnLengths = new Map()): SourceColumnMetadata[] {
  return columns.map((c) => {
    const d = sourceDescriptor(c.type, c.precision, c.scale, lengths.get(c.name));
    const wire = describeWireType(d, c.nullable);
    // a column the engine tied to a table but not a namespace lives in the current one
    const inTable = c.table !== undefined && c.table !== '';
    return {
      name: c.name,
      database: c.database ?? (inTable ? session.database : undefined) ?? '',
      schema: c.schema ?? (inTable ? session.schema : undefined) ?? '',
      table: c.table ?? '',
      nullable: c.nullable,
      type: wire.type,
      displayType: displayType(d),
      precision: wire.precision,
      scale: wire.scale,
      length: wire.length,
      byteLength: wire.byteLength,
      collation: null
    };
  });
}
