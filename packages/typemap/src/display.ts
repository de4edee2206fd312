// packages/typemap/src/display.ts
import { Errors, type TypeDescriptor } from '@frostbridge/core';
import { FRACTIONAL_SECONDS, MAX_BINARY_LENGTH, MAX_VARCHAR_LENGTH, NUMBER_PRECISION, NUMBER_SCALE } from './mapper';

export type WireType =
  | 'fixed' | 'real' | 'text' | 'binary' | 'boolean' | 'date' | 'time'
  | 'timestamp_ntz' | 'timestamp_tz' | 'variant' | 'object' | 'array';

/** Row-type record as the connector reports it for a result column. */
export interface WireColumnType {
  type: WireType;
  precision: number | null;
  scale: number | null;
  length: number | null;
  byteLength: number | null;
  nullable: boolean;
}

/** The type string DESCRIBE prints, e.g. NUMBER(38,0) or VARCHAR(16777216). */
export function displayType(d: TypeDescriptor): string {
  switch (d.sourceName) {
    case 'NUMBER':
      return `NUMBER(${d.numericPrecision ?? NUMBER_PRECISION},${d.numericScale ?? NUMBER_SCALE})`;
    case 'VARCHAR':
      return `VARCHAR(${d.characterLength ?? MAX_VARCHAR_LENGTH})`;
    case 'BINARY':
      return `BINARY(${d.characterLength ?? MAX_BINARY_LENGTH})`;
    case 'TIME':
    case 'TIMESTAMP_NTZ':
    case 'TIMESTAMP_TZ':
    case 'TIMESTAMP_LTZ':
      return `${d.sourceName}(${d.numericScale ?? FRACTIONAL_SECONDS})`;
    default:
      return d.sourceName;
  }
}

const blank = { precision: null, scale: null, length: null, byteLength: null };

export function describeWireType(d: TypeDescriptor, nullable = true): WireColumnType {
  switch (d.sourceName) {
    case 'NUMBER':
      return {
        ...blank,
        type: 'fixed',
        precision: d.numericPrecision ?? NUMBER_PRECISION,
        scale: d.numericScale ?? NUMBER_SCALE,
        nullable
      };
    case 'FLOAT':
      return { ...blank, type: 'real', nullable };
    case 'VARCHAR': {
      const length = d.characterLength ?? MAX_VARCHAR_LENGTH;
      return { ...blank, type: 'text', length, byteLength: Math.min(length * 4, MAX_VARCHAR_LENGTH), nullable };
    }
    case 'BINARY': {
      const length = d.characterLength ?? MAX_BINARY_LENGTH;
      return { ...blank, type: 'binary', length, byteLength: length, nullable };
    }
    case 'BOOLEAN':
      return { ...blank, type: 'boolean', nullable };
    case 'DATE':
      return { ...blank, type: 'date', nullable };
    case 'TIME':
      return { ...blank, type: 'time', precision: 0, scale: d.numericScale ?? FRACTIONAL_SECONDS, nullable };
    case 'TIMESTAMP_NTZ':
      return { ...blank, type: 'timestamp_ntz', precision: 0, scale: d.numericScale ?? FRACTIONAL_SECONDS, nullable };
    case 'TIMESTAMP_TZ':
    case 'TIMESTAMP_LTZ':
      return { ...blank, type: 'timestamp_tz', precision: 0, scale: d.numericScale ?? FRACTIONAL_SECONDS, nullable };
    case 'VARIANT':
      return { ...blank, type: 'variant', nullable };
    case 'OBJECT':
      return { ...blank, type: 'object', nullable };
    case 'ARRAY':
      return { ...blank, type: 'array', nullable };
    default:
      throw Errors.TYPE_FORWARD(d.sourceName);
  }
}
