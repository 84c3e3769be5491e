/**
 * Glob matching for index names.
 *
 * Only `*` is special (zero or more characters). Matching is case-sensitive and
 * anchored at both ends. The pattern is split on `*` and the literal segments
 * are searched for in order.
 */

export function matches(pattern: string, name: string): boolean {
  const segments = pattern.split('*');

  if (segments.length === 1) {
    return pattern === name;
  }

  const head = segments[0];
  const tail = segments[segments.length - 1];

  if (name.length < head.length + tail.length) {
    return false;
  }
  if (!name.startsWith(head) || !name.endsWith(tail)) {
    return false;
  }

  let cursor = head.length;
  const end = name.length - tail.length;

  for (const segment of segments.slice(1, -1)) {
    if (segment === '') {
      continue;
    }
    const found = name.indexOf(segment, cursor);
    if (found === -1 || found + segment.length > end) {
      return false;
    }
    cursor = found + segment.length;
  }

  return true;
}
