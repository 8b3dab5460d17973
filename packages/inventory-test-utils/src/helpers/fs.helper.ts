import { promises as fs } from 'fs';
import * as os from 'os';
import * as path from 'path';

/**
 * Fresh directory under the OS temp dir
 */
export async function createTempDir(prefix = 'inventory-test-'): Promise<string> {
  return fs.mkdtemp(path.join(os.tmpdir(), prefix));
}

export async function removeDir(directory: string): Promise<void> {
  await fs.rm(directory, { recursive: true, force: true });
}

/**
 * Write a file, creating parent directories
 */
export async function writeFixture(directory: string, relativePath: string, content: string): Promise<string> {
  const filePath = path.join(directory, relativePath);
  await fs.mkdir(path.dirname(filePath), { recursive: true });
  await fs.writeFile(filePath, content, 'utf-8');
  return filePath;
}

export async function pathExists(filePath: string): Promise<boolean> {
  try {
    await fs.access(filePath);
    return true;
  } catch {
    return false;
  }
}

