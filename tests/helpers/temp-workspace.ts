/**
 * Temporary Workspace for isolated tests
 * Creates temporary directory for each test
 */

import { mkdtemp, rm, readFile, writeFile, mkdir } from 'fs/promises';
import { dirname, join } from 'path';
import { tmpdir } from 'os';
import { existsSync } from 'fs';

export interface TempWorkspace {
  /** Workspace root directory */
  root: string;
  /** Cleanup workspace */
  cleanup: () => Promise<void>;
  /** Check file existence */
  exists: (relativePath: string) => boolean;
  /** Read file */
  readFile: (relativePath: string) => Promise<string>;
  /** Write file, creating parent directories */
  writeFile: (relativePath: string, content: string) => Promise<void>;
  /** Write a value as JSON */
  writeJson: (relativePath: string, value: unknown) => Promise<void>;
}

/**
 * Creates temporary workspace for test
 */
export async function createTempWorkspace(prefix = 'sfsymbols-test-'): Promise<TempWorkspace> {
  const root = await mkdtemp(join(tmpdir(), prefix));

  const workspace: TempWorkspace = {
    root,

    async cleanup() {
      await rm(root, { recursive: true, force: true });
    },

    exists(relativePath: string) {
      return existsSync(join(root, relativePath));
    },

    async readFile(relativePath: string) {
      return readFile(join(root, relativePath), 'utf-8');
    },

    async writeFile(relativePath: string, content: string) {
      const filePath = join(root, relativePath);
      await mkdir(dirname(filePath), { recursive: true });
      await writeFile(filePath, content, 'utf-8');
    },

    async writeJson(relativePath: string, value: unknown) {
      await workspace.writeFile(relativePath, JSON.stringify(value, null, 2));
    },
  };

  return workspace;
}
