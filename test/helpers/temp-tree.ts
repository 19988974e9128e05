import {mkdirSync, mkdtempSync, readdirSync, statSync, writeFileSync} from 'node:fs';
import {tmpdir} from 'node:os';
import {dirname, join, relative} from 'node:path';

export function createTempRoot(prefix = 'webrtc-packager-'): string {
  return mkdtempSync(join(tmpdir(), prefix));
}

/**
 * Writes `files` (relative path -> contents) under `root`.
 */
export function writeTree(root: string, files: Record<string, string>): void {
  for (const [pathname, contents] of Object.entries(files)) {
    const full = join(root, pathname);
    mkdirSync(dirname(full), {recursive: true});
    writeFileSync(full, contents);
  }
}

/** Every file under `root`, relative and sorted. */
export function listTree(root: string): string[] {
  const out: string[] = [];
  const visit = (dir: string): void => {
    for (const name of readdirSync(dir)) {
      const full = join(dir, name);
      if (statSync(full).isDirectory()) {
        visit(full);
      } else {
        out.push(relative(root, full));
      }
    }
  };
  visit(root);
  return out.sort();
}
