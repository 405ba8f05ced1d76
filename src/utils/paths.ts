import { join } from 'path';
import type { PathContext, Rule } from '../types.js';

const VARIABLE_PATTERN = /\$(?:\{([A-Za-z_][A-Za-z0-9_]*)\}|([A-Za-z_][A-Za-z0-9_]*))/g;

/**
 * Expands a leading `~` and `$VAR` / `${VAR}` references. When a referenced
 * variable is not set the input is returned untouched.
 */
export function expandPath(raw: string, context: PathContext): string {
  const env = context.env ?? {};
  let missing = false;

  const substituted = raw.replace(VARIABLE_PATTERN, (match, braced?: string, bare?: string) => {
    const name = braced ?? bare ?? '';
    const value = env[name];
    if (value === undefined) {
      missing = true;
      return match;
    }
    return value;
  });

  if (missing) return raw;

  if (substituted === '~') return context.home;
  if (substituted.startsWith('~/')) return join(context.home, substituted.slice(2));
  return substituted;
}

export function expandedPaths(rule: Rule, context: PathContext): string[] {
  return rule.paths.map((raw) => expandPath(raw, context));
}
