import { promises as fs, constants as fsConstants, Stats } from 'fs';
import { join, dirname, relative, sep } from 'path';
import { isJunk } from 'junk';
import { logger } from './logger.js';
import { FileSystemError, getErrorCode } from './errors.js';

/**
 * File system utilities with proper error handling
 */

/**
 * Check if a file or directory exists
 */
export async function exists(path: string): Promise<boolean> {
  try {
    await fs.access(path, fsConstants.F_OK);
    return true;
  } catch {
    return false;
  }
}

/**
 * Recursively create directories
 */
export async function ensureDir(path: string): Promise<void> {
  try {
    await fs.mkdir(path, { recursive: true });
  } catch (error) {
    throw new FileSystemError(`Failed to locate or create directory: ${path}`, { path, error });
  }
}

/**
 * Read a file as text
 */
export async function readTextFile(path: string, encoding: BufferEncoding = 'utf8'): Promise<string> {
  try {
    return await fs.readFile(path, encoding);
  } catch (error) {
    throw new FileSystemError(`Failed to read file: ${path}`, { path, error });
  }
}

/**
 * Write text to a file
 */
export async function writeTextFile(path: string, content: string, encoding: BufferEncoding = 'utf8'): Promise<void> {
  try {
    await ensureDir(dirname(path));
    await fs.writeFile(path, content, encoding);
    logger.debug(`Wrote file: ${path}`);
  } catch (error) {
    throw new FileSystemError(`Failed to write file: ${path}`, { path, error });
  }
}

/**
 * Copy a file, carrying the source's access and modification times over to the copy
 */
export async function copyFile(src: string, dest: string): Promise<void> {
  try {
    await ensureDir(dirname(dest));
    await fs.copyFile(src, dest);
    const stats = await fs.stat(src);
    await fs.utimes(dest, stats.atime, stats.mtime);
  } catch (error) {
    throw new FileSystemError(`Failed to copy file: ${src} -> ${dest}`, { src, dest, error });
  }
}

/**
 * Remove a file or directory recursively
 */
export async function remove(path: string): Promise<void> {
  try {
    await fs.rm(path, { recursive: true });
    logger.debug(`Removed: ${path}`);
  } catch (error) {
    if (getErrorCode(error) === 'ENOENT') {
      return;
    }
    throw new FileSystemError(`Failed to remove: ${path}`, { path, error });
  }
}

/**
 * List directories in a directory (non-recursive)
 */
export async function listDirectories(dirPath: string): Promise<string[]> {
  try {
    const entries = await fs.readdir(dirPath, { withFileTypes: true });
    return entries
      .filter(entry => entry.isDirectory())
      .map(entry => entry.name);
  } catch (error) {
    throw new FileSystemError(`Failed to list directories in directory: ${dirPath}`, { dirPath, error });
  }
}

export interface WalkOptions {
  /** Skip OS junk files such as .DS_Store (default true) */
  skipJunk?: boolean;
  /** Return false to leave a directory (given relative to the walk root, posix separators) unvisited */
  enterDirectory?: (relativePath: string) => boolean;
}

/**
 * Recursively walk through a directory and yield all files
 */
export async function* walkFiles(dirPath: string, options: WalkOptions = {}, root: string = dirPath): AsyncGenerator<string> {
  const skipJunk = options.skipJunk ?? true;
  let entries;
  try {
    entries = await fs.readdir(dirPath, { withFileTypes: true });
  } catch (error) {
    throw new FileSystemError(`Failed to walk directory: ${dirPath}`, { dirPath, error });
  }

  for (const entry of entries) {
    if (skipJunk && isJunk(entry.name)) {
      continue;
    }

    const fullPath = join(dirPath, entry.name);
    if (entry.isFile()) {
      yield fullPath;
    } else if (entry.isDirectory()) {
      if (options.enterDirectory && !options.enterDirectory(toPosixPath(relative(root, fullPath)))) {
        continue;
      }
      yield* walkFiles(fullPath, options, root);
    }
  }
}

/**
 * Convert a platform path to forward-slash form for glob matching and stable ordering
 */
export function toPosixPath(path: string): string {
  return path.split(sep).join('/');
}

export interface CopyTreeOptions extends WalkOptions {
  /** Relative posix path of each file; return false to skip it */
  filter?: (relativePath: string) => boolean;
}

/**
 * Copy a directory tree file by file, preserving modification times.
 * Returns the copied files' paths relative to the source root.
 */
export async function copyTree(srcDir: string, destDir: string, options: CopyTreeOptions = {}): Promise<string[]> {
  const copied: string[] = [];
  await ensureDir(destDir);

  for await (const filePath of walkFiles(srcDir, options)) {
    const rel = toPosixPath(relative(srcDir, filePath));
    if (options.filter && !options.filter(rel)) {
      continue;
    }
    await copyFile(filePath, join(destDir, rel));
    copied.push(rel);
  }

  logger.debug(`Copied ${copied.length} files: ${srcDir} -> ${destDir}`);
  return copied.sort();
}

/**
 * Get file stats
 */
export async function getStats(path: string): Promise<Stats> {
  try {
    return await fs.stat(path);
  } catch (error) {
    throw new FileSystemError(`Failed to get stats for: ${path}`, { path, error });
  }
}

/**
 * Read JSON file and parse it
 */
export async function readJsonFile(path: string): Promise<unknown> {
  const content = await readTextFile(path);
  try {
    return JSON.parse(content);
  } catch (error) {
    throw new FileSystemError(`Failed to parse JSON file: ${path}`, { path, error });
  }
}

/**
 * Write object to JSON file
 */
export async function writeJsonFile(path: string, data: unknown, indent: number = 2): Promise<void> {
  await writeTextFile(path, JSON.stringify(data, null, indent) + '\n');
}
