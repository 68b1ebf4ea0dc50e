import * as fs from 'node:fs';
import { printDebug } from './output-formatter.js';
import { spawnSync } from './spawn.js';

export const PASSWD_PATH = '/etc/passwd';

/**
 * Parse passwd(5) text into a uid -> name map. When a UID appears more than
 * once the first entry wins, as getpwuid does.
 */
export function parsePasswd(text: string): Map<number, string> {
  const names = new Map<number, string>();
  for (const line of text.split('\n')) {
    const trimmed = line.trim();
    if (!trimmed || trimmed.startsWith('#')) continue;
    const fields = trimmed.split(':');
    if (fields.length < 3) continue;
    const uid = Number.parseInt(fields[2], 10);
    if (!fields[0] || !Number.isFinite(uid)) continue;
    if (!names.has(uid)) names.set(uid, fields[0]);
  }
  return names;
}

export type UserLookup = (name: string) => boolean;

// Asks the system account database, which also covers NSS sources such as LDAP.
export const systemUserLookup: UserLookup = (name) => {
  const res = spawnSync(['id', '-u', name]);
  return !res.failed && res.exitCode === 0;
};

/**
 * Resolves UIDs to account names and checks that an account exists.
 */
export class UserDirectory {
  private readonly known = new Set<string>();

  constructor(
    private readonly names: Map<number, string>,
    private readonly fallbackLookup: UserLookup = systemUserLookup
  ) {
    for (const name of names.values()) this.known.add(name);
  }

  static fromPasswdFile(path = PASSWD_PATH): UserDirectory {
    try {
      return new UserDirectory(parsePasswd(fs.readFileSync(path, 'utf8')));
    } catch (error) {
      printDebug(`Could not read ${path}: ${String(error)}`);
      return new UserDirectory(new Map());
    }
  }

  nameOf(uid: number): string {
    return this.names.get(uid) ?? `#${uid}`;
  }

  hasUser(name: string): boolean {
    if (this.known.has(name)) return true;
    if (this.fallbackLookup(name)) {
      this.known.add(name);
      return true;
    }
    return false;
  }
}
