import { readFile } from 'fs/promises';

export const PASSWD_PATH = '/etc/passwd';

export function isRoot(): boolean {
  return typeof process.geteuid === 'function' && process.geteuid() === 0;
}

/** Home directory of `user` according to passwd-format `content`. */
export function homeFromPasswd(content: string, user: string): string | undefined {
  for (const line of content.split('\n')) {
    const fields = line.split(':');
    if (fields[0] === user && fields.length >= 6) {
      return fields[5];
    }
  }
  return undefined;
}

export interface ResolveHomeOptions {
  isRoot: boolean;
  override?: string;
  env: Readonly<Record<string, string | undefined>>;
  passwdPath?: string;
}

/**
 * Home directory the rules should expand against. Under sudo this is the
 * invoking user's home, not root's.
 */
export async function resolveHome(options: ResolveHomeOptions): Promise<string | undefined> {
  if (options.override) return options.override;

  const sudoUser = options.env.SUDO_USER;
  if (options.isRoot && sudoUser) {
    try {
      const home = homeFromPasswd(await readFile(options.passwdPath ?? PASSWD_PATH, 'utf-8'), sudoUser);
      if (home) return home;
    } catch (error) {
      console.error(`[Home] Could not read ${options.passwdPath ?? PASSWD_PATH}:`, error);
    }
  }

  return options.env.HOME;
}
