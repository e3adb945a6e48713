/**
 * File Writer - store the generated Swift source
 */

import { mkdir, writeFile } from 'fs/promises';
import { dirname } from 'path';

/**
 * Result of writing the output file
 */
export interface WriteResult {
  /** Success status */
  success: boolean;
  /** Absolute path of the output file */
  path: string;
  /** Bytes written */
  bytes: number;
  /** Error message (if failed) */
  error?: string;
}

/**
 * Write the source to `outputPath`, creating parent directories
 *
 * Failures are reported in the result rather than thrown.
 */
export async function writeGeneratedSource(outputPath: string, source: string): Promise<WriteResult> {
  try {
    await mkdir(dirname(outputPath), { recursive: true });
    await writeFile(outputPath, source, 'utf-8');
    return { success: true, path: outputPath, bytes: Buffer.byteLength(source, 'utf-8') };
  } catch (error) {
    return {
      success: false,
      path: outputPath,
      bytes: 0,
      error: error instanceof Error ? error.message : String(error),
    };
  }
}
