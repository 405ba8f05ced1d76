import { sep } from 'path';

export function errorCode(error: unknown): string | undefined {
  if (error instanceof Error && 'code' in error && typeof error.code === 'string') {
    return error.code;
  }
  return undefined;
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

export function isNotFound(error: unknown): boolean {
  return errorCode(error) === 'ENOENT';
}

export function pathDepth(path: string): number {
  return path.split(sep).filter(Boolean).length;
}

/** True when `child` lies strictly below `parent`. */
export function isNestedUnder(child: string, parent: string): boolean {
  const prefix = parent.endsWith(sep) ? parent : parent + sep;
  return child.length > prefix.length && child.startsWith(prefix);
}
