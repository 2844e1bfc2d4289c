import { mkdir, readdir, readFile, rename, rm, writeFile } from 'node:fs/promises';
import path from 'node:path';

let tmpCounter = 0;

const hasCode = (error: unknown, code: string): boolean =>
  typeof error === 'object' && error !== null && 'code' in error && error.code === code;

const isMissing = (error: unknown): boolean => hasCode(error, 'ENOENT');

export async function readJsonFile(filePath: string): Promise<unknown> {
  try {
    return JSON.parse(await readFile(filePath, 'utf8'));
  } catch (error) {
    if (isMissing(error)) return undefined;
    throw error;
  }
}

export async function writeJsonFile(filePath: string, value: unknown, indent = 2): Promise<void> {
  await mkdir(path.dirname(filePath), { recursive: true });

  tmpCounter += 1;
  const tmpPath = `${filePath}.${process.pid}.${Date.now()}.${tmpCounter}.tmp`;
  try {
    await writeFile(tmpPath, JSON.stringify(value, null, indent), 'utf8');
    await rename(tmpPath, filePath);
  } catch (error) {
    await rm(tmpPath, { force: true });
    throw error;
  }
}

export async function listFiles(dirPath: string): Promise<string[]> {
  try {
    return (await readdir(dirPath)).sort();
  } catch (error) {
    if (isMissing(error)) return [];
    throw error;
  }
}

// false when `filePath` already exists; never overwrites.
export async function createJsonFile(filePath: string, value: unknown, indent = 2): Promise<boolean> {
  await mkdir(path.dirname(filePath), { recursive: true });
  try {
    await writeFile(filePath, JSON.stringify(value, null, indent), { encoding: 'utf8', flag: 'wx' });
    return true;
  } catch (error) {
    if (hasCode(error, 'EEXIST')) return false;
    throw error;
  }
}
