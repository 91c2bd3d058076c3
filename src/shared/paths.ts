/**
 * @file src/shared/paths.ts
 * @description Canonical locations used by the ones-wiki CLI.
 */

import fs from 'node:fs';
import os from 'node:os';
import path from 'node:path';

const ROOT = process.env.ONES_WIKI_HOME ?? path.join(os.homedir(), '.ones-wiki');

const ensureDir = (target: string): void => {
  fs.mkdirSync(target, { recursive: true });
};

export const paths = {
  ROOT,
  CONFIG: path.join(ROOT, '.oneswikirc.json'),
  ensureDir,
};
