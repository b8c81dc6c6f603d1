import { mkdir, mkdtemp, rm } from 'fs/promises';
import { join } from 'path';

export const createTempDir = async (root: string, prefix: string) => {
  await mkdir(root, { recursive: true });
  const dir = await mkdtemp(join(root, `${prefix}-`));
  return dir;
};

export const cleanupTempDir = async (dir: string) => {
  await rm(dir, { recursive: true, force: true });
};
