/**
 * Atomic Write Utilities
 *
 * Write-to-temp-then-rename, so a crash mid-write leaves either the old
 * file or the new one, never a truncated registry.
 *
 * **Pattern:**
 * 1. Write to temporary file (unique name with PID to prevent conflicts)
 * 2. Rename temp file to target path (atomic operation on POSIX)
 * 3. Cleanup temp file on error
 *
 * Synchronous by design of the cup core: every operation runs to completion
 * without yielding.
 */

import { mkdirSync, renameSync, rmSync, writeFileSync } from 'node:fs';
import { dirname } from 'node:path';

/**
 * Atomically write string or binary data to file
 *
 * @throws Error if write or rename fails
 */
export function atomicWriteFileSync(
  filePath: string,
  data: string | Uint8Array,
  encoding: BufferEncoding = 'utf-8'
): void {
  mkdirSync(dirname(filePath), { recursive: true });

  const tempPath = `${filePath}.${process.pid}.${Date.now()}.tmp`;

  try {
    if (typeof data === 'string') {
      writeFileSync(tempPath, data, encoding);
    } else {
      writeFileSync(tempPath, data);
    }
    renameSync(tempPath, filePath);
  } catch (error) {
    // force: the temp file may never have been created
    rmSync(tempPath, { force: true });
    throw error;
  }
}

/**
 * Atomically write JSON data to file, with a trailing newline
 *
 * @param space - JSON.stringify space parameter (default: 2)
 */
export function atomicWriteJSONSync(
  filePath: string,
  data: unknown,
  space: number | string = 2
): void {
  atomicWriteFileSync(filePath, `${JSON.stringify(data, null, space)}\n`, 'utf-8');
}
