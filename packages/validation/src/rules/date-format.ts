import { ConfigurationError } from '@framecheck/core';

function names(options: Intl.DateTimeFormatOptions, count: number, dateOf: (i: number) => Date): string[] {
  const format = new Intl.DateTimeFormat('en-US', { ...options, timeZone: 'UTC' });
  return Array.from({ length: count }, (_, i) => format.format(dateOf(i)).toLowerCase());
}

const monthOf = (i: number) => new Date(Date.UTC(2001, i, 1));
// 2001-01-01 was a Monday
const weekdayOf = (i: number) => new Date(Date.UTC(2001, 0, 1 + i));

const MONTHS_LONG = names({ month: 'long' }, 12, monthOf);
const MONTHS_SHORT = names({ month: 'short' }, 12, monthOf);
const WEEKDAYS_LONG = names({ weekday: 'long' }, 7, weekdayOf);
const WEEKDAYS_SHORT = names({ weekday: 'short' }, 7, weekdayOf);

const alternatives = (values: readonly string[]) => [...values].sort((a, b) => b.length - a.length).join('|');

const DIRECTIVES: Record<string, string> = {
  A: alternatives(WEEKDAYS_LONG),
  B: alternatives(MONTHS_LONG),
  H: '2[0-3]|[0-1]\\d|\\d',
  I: '1[0-2]|0[1-9]|[1-9]',
  M: '[0-5]\\d|\\d',
  S: '6[0-1]|[0-5]\\d|\\d',
  Y: '\\d{4}',
  a: alternatives(WEEKDAYS_SHORT),
  b: alternatives(MONTHS_SHORT),
  d: '3[0-1]|[1-2]\\d|0[1-9]|[1-9]| [1-9]',
  f: '\\d{1,6}',
  j: '36[0-6]|3[0-5]\\d|[1-2]\\d\\d|0[1-9]\\d|00[1-9]|[1-9]\\d|0[1-9]|[1-9]',
  m: '1[0-2]|0[1-9]|[1-9]',
  p: 'am|pm',
  y: '\\d\\d',
  z: '[+-]\\d\\d:?[0-5]\\d|Z',
};

function escapeLiteral(text: string): string {
  return text.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

function isLeapYear(year: number): boolean {
  return (year % 4 === 0 && year % 100 !== 0) || year % 400 === 0;
}

function daysInMonth(year: number, month: number): number {
  return new Date(Date.UTC(year, month, 0)).getUTCDate();
}

function isRealDate(fields: Record<string, string>): boolean {
  const number = (key: string) => {
    const value = fields[key];
    return value === undefined ? undefined : Number(value);
  };

  const shortYear = number('y');
  const year = number('Y') ?? (shortYear === undefined ? 1900 : shortYear + (shortYear < 69 ? 2000 : 1900));

  const monthName = fields['B'] ?? fields['b'];
  const month =
    number('m') ??
    (monthName === undefined
      ? undefined
      : Math.max(MONTHS_LONG.indexOf(monthName.toLowerCase()), MONTHS_SHORT.indexOf(monthName.toLowerCase())) + 1);
  const day = number('d');
  const dayOfYear = number('j');

  if (dayOfYear !== undefined && month === undefined && day === undefined) {
    return dayOfYear <= (isLeapYear(year) ? 366 : 365);
  }
  if ((day ?? 1) > daysInMonth(year, month ?? 1)) {
    return false;
  }

  const seconds = number('S');
  if (seconds !== undefined && seconds > 59) {
    return false;
  }

  const offset = fields['z'];
  if (offset !== undefined && offset !== 'Z' && offset !== 'z') {
    return Number(offset.slice(1, 3)) < 24;
  }
  return true;
}

/**
 * Compile a strptime-style format into a matcher.
 *
 * Supports `%Y %y %m %d %H %I %M %S %f %p %b %B %a %A %j %z %%`. Whitespace in
 * the format matches any run of whitespace; matching ignores case. A match
 * must also name a real date (no 31 April, no 29 February outside leap years,
 * which includes formats without a year).
 *
 * @throws ConfigurationError on an unknown or repeated directive
 */
export function compileDateFormat(format: string): (text: string) => boolean {
  const groups: string[] = [];
  let source = '';

  for (let i = 0; i < format.length; i++) {
    const char = format.charAt(i);

    if (char === '%') {
      const directive = format.charAt(i + 1);
      i++;
      if (directive === '%') {
        source += '%';
        continue;
      }
      const pattern = DIRECTIVES[directive];
      if (pattern === undefined) {
        throw new ConfigurationError(`Unsupported directive "%${directive}" in date format "${format}"`);
      }
      if (groups.includes(directive)) {
        throw new ConfigurationError(`Directive "%${directive}" appears twice in date format "${format}"`);
      }
      groups.push(directive);
      source += `(${pattern})`;
    } else if (/\s/.test(char)) {
      source += '\\s+';
      while (i + 1 < format.length && /\s/.test(format.charAt(i + 1))) i++;
    } else {
      source += escapeLiteral(char);
    }
  }

  const regex = new RegExp(`^${source}$`, 'i');

  return (text: string) => {
    const match = regex.exec(text);
    if (match === null) {
      return false;
    }
    const fields: Record<string, string> = {};
    groups.forEach((directive, i) => {
      const value = match[i + 1];
      if (value !== undefined) fields[directive] = value.trim();
    });
    return isRealDate(fields);
  };
}
