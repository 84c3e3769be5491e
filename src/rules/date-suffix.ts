/**
 * Date Suffix Parser
 *
 * Reads the date encoded at the end of an index name, e.g. `app-logs-2024.01.31`
 * with pattern `%Y.%m.%d`.
 *
 * Supported directives (all fixed width, zero padded):
 *   %Y  year, 4 digits
 *   %y  year, 2 digits (00-69 => 20xx, 70-99 => 19xx)
 *   %m  month, 2 digits
 *   %d  day of month, 2 digits
 *   %H  hour, 2 digits
 *   %M  minute, 2 digits
 *   %S  second, 2 digits
 *   %%  literal percent sign
 * Any other character is matched literally.
 */

type Field = 'year' | 'shortYear' | 'month' | 'day' | 'hour' | 'minute' | 'second';

type Token = { kind: 'field'; field: Field; width: number } | { kind: 'literal'; text: string };

const DIRECTIVES: Record<string, { field: Field; width: number }> = {
  Y: { field: 'year', width: 4 },
  y: { field: 'shortYear', width: 2 },
  m: { field: 'month', width: 2 },
  d: { field: 'day', width: 2 },
  H: { field: 'hour', width: 2 },
  M: { field: 'minute', width: 2 },
  S: { field: 'second', width: 2 },
};

const DIGITS = /^\d+$/;

/**
 * Returns null when the pattern contains an unknown directive or lacks
 * a year, month or day.
 */
function tokenize(datePattern: string): Token[] | null {
  const tokens: Token[] = [];

  for (let i = 0; i < datePattern.length; i++) {
    const char = datePattern[i];
    if (char !== '%') {
      tokens.push({ kind: 'literal', text: char });
      continue;
    }

    const directive = datePattern[i + 1];
    i++;
    if (directive === '%') {
      tokens.push({ kind: 'literal', text: '%' });
      continue;
    }
    const definition = directive === undefined ? undefined : DIRECTIVES[directive];
    if (!definition) {
      return null;
    }
    tokens.push({ kind: 'field', ...definition });
  }

  const fields = new Set(tokens.flatMap<Field>((t) => (t.kind === 'field' ? [t.field] : [])));
  const hasYear = fields.has('year') || fields.has('shortYear');
  if (!hasYear || !fields.has('month') || !fields.has('day')) {
    return null;
  }
  return tokens;
}

function tokenWidth(token: Token): number {
  return token.kind === 'field' ? token.width : token.text.length;
}

function utcDate(year: number, monthIndex: number, day: number): Date {
  // setUTCFullYear keeps years below 100 as-is, unlike Date.UTC
  const date = new Date(0);
  date.setUTCFullYear(year, monthIndex, day);
  return date;
}

export function daysInMonth(year: number, month: number): number {
  // Day 0 of the following month is the last day of this one
  return utcDate(year, month, 0).getUTCDate();
}

export function extractSuffixDate(name: string, datePattern: string): Date | undefined {
  const tokens = tokenize(datePattern);
  if (!tokens) {
    return undefined;
  }

  const width = tokens.reduce((sum, token) => sum + tokenWidth(token), 0);
  if (width === 0 || name.length < width) {
    return undefined;
  }

  const suffix = name.slice(name.length - width);
  const values: Partial<Record<Field, number>> = {};
  let offset = 0;

  for (const token of tokens) {
    const chunk = suffix.slice(offset, offset + tokenWidth(token));
    offset += tokenWidth(token);

    if (token.kind === 'literal') {
      if (chunk !== token.text) {
        return undefined;
      }
      continue;
    }
    if (!DIGITS.test(chunk)) {
      return undefined;
    }
    const value = parseInt(chunk, 10);
    const previous = values[token.field];
    // A field repeated in the pattern must carry the same value
    if (previous !== undefined && previous !== value) {
      return undefined;
    }
    values[token.field] = value;
  }

  const year =
    values.year ??
    (values.shortYear === undefined
      ? undefined
      : values.shortYear < 70
        ? 2000 + values.shortYear
        : 1900 + values.shortYear);
  const { month, day, hour = 0, minute = 0, second = 0 } = values;

  if (year === undefined || month === undefined || day === undefined) {
    return undefined;
  }
  if (values.year !== undefined && values.shortYear !== undefined && values.year % 100 !== values.shortYear) {
    return undefined;
  }
  if (month < 1 || month > 12) {
    return undefined;
  }
  if (day < 1 || day > daysInMonth(year, month)) {
    return undefined;
  }
  if (hour > 23 || minute > 59 || second > 59) {
    return undefined;
  }

  return utcDate(year, month - 1, day);
}
