// Glob subset used by trigger filters and cache key files:
//   "**" crosses path separators, "*" stays within one segment, "?" is one char.
// A "**/" prefix also matches zero directories ("**/a.json" matches "a.json").

export function normalizePath(p: string): string {
  let s = p.trim().replace(/\\/g, '/');
  while (s.startsWith('./')) s = s.slice(2);
  return s.replace(/\/{2,}/g, '/');
}

export function hasWildcard(pattern: string): boolean {
  return pattern.includes('*') || pattern.includes('?');
}

export function globToRegExp(glob: string): RegExp {
  const g = normalizePath(glob);
  let re = '^';
  for (let i = 0; i < g.length; i++) {
    const c = g[i];
    if (c === '*') {
      if (g[i + 1] === '*') {
        i++;
        if (g[i + 1] === '/') {
          i++;
          re += '(?:.*/)?';
        } else {
          re += '.*';
        }
      } else {
        re += '[^/]*';
      }
      continue;
    }
    if (c === '?') {
      re += '[^/]';
      continue;
    }
    re += escapeRegExpChar(c);
  }
  re += '$';
  return new RegExp(re);
}

export function matchesGlob(pattern: string, value: string): boolean {
  const pat = normalizePath(pattern);
  if (!pat) return false;
  const v = normalizePath(value);
  if (!hasWildcard(pat)) return v === pat;
  return globToRegExp(pat).test(v);
}

export function matchesAny(patterns: readonly string[], value: string): boolean {
  return patterns.some(p => matchesGlob(p, value));
}

function escapeRegExpChar(c: string): string {
  return /[\\^$.*+?()[\]{}|]/.test(c) ? `\\${c}` : c;
}
