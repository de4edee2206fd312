// packages/catalog/src/formats.ts
import { Errors } from '@frostbridge/core';

// longest tokens first
const TOKENS: Array<[string, string]> = [
  ['YYYY', '%Y'], ['YY', '%y'],
  ['MMMM', '%B'], ['MON', '%b'], ['MM', '%m'],
  ['DD', '%d'], ['DY', '%a'],
  ['HH24', '%H'], ['HH12', '%I'], ['HH', '%H'],
  ['MI', '%M'], ['SS', '%S'],
  ['FF9', '%n'], ['FF6', '%f'], ['FF3', '%g'], ['FF', '%n'],
  ['AM', '%p'], ['PM', '%p'],
  ['TZH:TZM', '%z'], ['TZHTZM', '%z']
];

/**
 * Rewrites a date/time format model (`YYYY-MM-DD HH24:MI:SS`) as a strftime pattern.
 * Quoted text passes through literally.
 */
export function toStrftime(format: string, fnName: string): string {
  let out = '';
  let i = 0;
  outer: while (i < format.length) {
    const c = format[i];
    if (c === '"') {
      const end = format.indexOf('"', i + 1);
      const text = end < 0 ? format.slice(i + 1) : format.slice(i + 1, end);
      out += text.replace(/%/g, '%%');
      i = end < 0 ? format.length : end + 1;
      continue;
    }
    const rest = format.slice(i).toUpperCase();
    for (const [tok, rep] of TOKENS) {
      if (rest.startsWith(tok)) {
        out += rep;
        i += tok.length;
        continue outer;
      }
    }
    if (/[A-Za-z]/.test(c)) throw Errors.UNSUPPORTED_FUNCTION(fnName, 2, `format element at '${format.slice(i)}' is not supported`);
    out += c === '%' ? '%%' : c;
    i++;
  }
  return out;
}
