import { readFile } from 'fs/promises';
import { isNotFound } from './fs.js';

export const OS_RELEASE_PATH = '/etc/os-release';

export interface Distro {
  id?: string;
  idLike: string[];
}

export function parseOsRelease(content: string): Distro {
  const distro: Distro = { idLike: [] };

  for (const rawLine of content.split('\n')) {
    const line = rawLine.trim();
    if (line === '' || line.startsWith('#')) continue;

    const eq = line.indexOf('=');
    const key = eq === -1 ? line : line.slice(0, eq);
    const value = eq === -1 ? '' : line.slice(eq + 1).trim().replace(/^"+|"+$/g, '');

    if (key === 'ID') {
      distro.id = value;
    } else if (key === 'ID_LIKE') {
      distro.idLike = value.split(/\s+/).filter(Boolean);
    }
  }

  return distro;
}

export async function detectDistro(path = OS_RELEASE_PATH): Promise<Distro> {
  try {
    return parseOsRelease(await readFile(path, 'utf-8'));
  } catch (error) {
    if (isNotFound(error)) return { idLike: [] };
    throw error;
  }
}

export function distroIdentifiers(distro: Distro): string[] {
  const ids = distro.id === undefined ? [] : [distro.id.toLowerCase()];
  return [...ids, ...distro.idLike.map((id) => id.toLowerCase())];
}
