/**
 * Hash Utilities Module
 * Content hashing for fingerprints, stub records and artifact digests
 */

import { createHash } from 'crypto';
import { readFile } from 'fs/promises';
import { xxhash3 } from 'hash-wasm';
import { FileSystemError } from './errors.js';

/**
 * SHA-256 hex digest of a string
 */
export function sha256Hex(content: string | Buffer): string {
  return createHash('sha256').update(content).digest('hex');
}

/**
 * Calculate a fast content hash using xxhash3
 */
export async function calculateContentHash(content: string | Uint8Array): Promise<string> {
  return await xxhash3(content);
}

/**
 * Calculate the xxhash3 of a file's bytes
 */
export async function calculateFileHash(path: string): Promise<string> {
  let content: Buffer;
  try {
    content = await readFile(path);
  } catch (error) {
    throw new FileSystemError(`Failed to read file for hashing: ${path}`, { path, error });
  }
  return await calculateContentHash(content);
}

/**
 * SHA-256 of a file's bytes
 */
export async function calculateFileSha256(path: string): Promise<string> {
  try {
    return sha256Hex(await readFile(path));
  } catch (error) {
    throw new FileSystemError(`Failed to read file for hashing: ${path}`, { path, error });
  }
}
