// packages/sql/src/keywords.ts
import keywords from './keywords.json';

export const RESERVED: ReadonlySet<string> = new Set(keywords.reserved);

export const isReserved = (word: string): boolean => RESERVED.has(word.toUpperCase());
