import picomatch from 'picomatch';
import { errorMessage } from './fs.js';

// `bash` makes a single `*` cross `/`, so `*/keep.txt` also matches
// `a/b/keep.txt`. Patterns are tested against the whole relative path.
const MATCH_OPTIONS: picomatch.PicomatchOptions = {
  dot: true,
  bash: true,
  nonegate: true,
};

const STARS_ONLY = /^\*+$/;

export interface ExcludeMatcher {
  /**
   * `relativePath` is relative to the walk root, `/`-separated. The empty
   * path stands for the root itself and only star-only patterns match it.
   */
  matches(relativePath: string): boolean;
}

export interface CompiledExcludes {
  matcher: ExcludeMatcher | null;
  errors: string[];
}

interface CompiledPattern {
  pattern: string;
  test: (path: string) => boolean;
}

/**
 * Compiles exclusion patterns. Invalid patterns are reported and skipped;
 * the remaining ones still take effect.
 */
export function compileExcludes(patterns: readonly string[]): CompiledExcludes {
  if (patterns.length === 0) {
    return { matcher: null, errors: [] };
  }

  const errors: string[] = [];
  const compiled: CompiledPattern[] = [];

  for (const pattern of patterns) {
    if (pattern.trim() === '') {
      errors.push(`Invalid exclude glob "${pattern}": pattern is empty`);
      continue;
    }
    try {
      compiled.push({ pattern, test: picomatch(pattern, MATCH_OPTIONS) });
    } catch (error) {
      errors.push(`Invalid exclude glob "${pattern}": ${errorMessage(error)}`);
    }
  }

  if (compiled.length === 0) {
    return { matcher: null, errors };
  }

  return {
    matcher: {
      matches(relativePath) {
        if (relativePath === '') {
          return compiled.some(({ pattern }) => STARS_ONLY.test(pattern));
        }
        return compiled.some(({ test }) => test(relativePath));
      },
    },
    errors,
  };
}
