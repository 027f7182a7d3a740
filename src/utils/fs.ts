import { promises as fs, constants as fsConstants } from 'fs';
import { join } from 'path';
import { parse as parseJsonc, printParseErrorCode, type ParseError } from 'jsonc-parser';
import { logger } from './logger.js';
import { FileSystemError } from './errors.js';

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
    logger.debug(`Directory located or created: ${path}`);
  } catch (error) {
    throw new FileSystemError(`Failed to locate or create directory: ${path}`, { path, error });
  }
}

/**
 * Create a uniquely named directory under `parent`
 */
export async function makeTempDir(parent: string, prefix: string): Promise<string> {
  await ensureDir(parent);
  try {
    return await fs.mkdtemp(join(parent, prefix));
  } catch (error) {
    throw new FileSystemError(`Failed to create temporary directory in ${parent}`, { parent, prefix, error });
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
 * Write raw bytes to a file, replacing it
 */
export async function writeBinaryFile(path: string, content: Uint8Array): Promise<void> {
  try {
    await fs.writeFile(path, content);
    logger.debug(`Wrote file: ${path} (${content.byteLength} bytes)`);
  } catch (error) {
    throw new FileSystemError(`Failed to write file: ${path}`, { path, error });
  }
}

/**
 * Mark a file executable for its owner, group and others
 */
export async function makeExecutable(path: string): Promise<void> {
  try {
    await fs.chmod(path, 0o755);
  } catch (error) {
    throw new FileSystemError(`Failed to make file executable: ${path}`, { path, error });
  }
}

/**
 * Remove a file or directory recursively
 */
export async function remove(path: string): Promise<void> {
  try {
    await fs.rm(path, { recursive: true, force: true });
    logger.debug(`Removed: ${path}`);
  } catch (error) {
    throw new FileSystemError(`Failed to remove: ${path}`, { path, error });
  }
}

/**
 * Read a JSON or JSONC file (comments and trailing commas allowed)
 */
export async function readJsonOrJsoncFile<T>(path: string): Promise<T> {
  const content = await readTextFile(path);
  const errors: ParseError[] = [];
  const result: T | undefined = parseJsonc(content, errors, { allowTrailingComma: true });
  if (errors.length > 0 || result === undefined) {
    const reason = errors.length > 0 ? printParseErrorCode(errors[0].error) : 'empty document';
    throw new FileSystemError(`Failed to parse JSON/JSONC file: ${path} (${reason})`, { path });
  }
  return result;
}
