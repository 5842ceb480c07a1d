/**
 * Glob matching for file filters: `**` spans directories, `*` stays within
 * one path segment, `?` is one character within a segment, and `.` is literal. Other characters pass through to the
 * regex as written, so a pattern that is not a valid regex falls back to a
 * substring test on the pattern with its `*`s removed.
 */
export type PathMatcher = (path: string) => boolean;

export function globToRegex(pattern: string): RegExp {
  let source = '';
  for (let i = 0; i < pattern.length; i++) {
    const ch = pattern[i];
    if (ch === '*' && pattern[i + 1] === '*') {
      source += '.*';
      i++;
    } else if (ch === '*') {
      source += '[^/]*';
    } else if (ch === '?') {
      source += '[^/]';
    } else if (ch === '.') {
      source += '\\.';
    } else {
      source += ch;
    }
  }
  return new RegExp(`^${source}$`, 'i');
}

/**
 * Build a matcher for project-relative paths. A pattern without `/` is
 * tested against the file name alone, so `*.js` finds `src/main.js`.
 */
export function createPathMatcher(pattern: string): PathMatcher {
  const byName = !pattern.includes('/');
  const subject = (path: string) => (byName ? path.slice(path.lastIndexOf('/') + 1) : path);

  let regex: RegExp;
  try {
    regex = globToRegex(pattern);
  } catch {
    const needle = pattern.replace(/\*/g, '').toLowerCase();
    return (path) => subject(path).toLowerCase().includes(needle);
  }
  return (path) => regex.test(subject(path));
}

/** Matcher for an optional pattern; absent or blank matches everything. */
export function optionalPathMatcher(pattern: string | undefined): PathMatcher {
  return pattern && pattern.trim() ? createPathMatcher(pattern.trim()) : () => true;
}
