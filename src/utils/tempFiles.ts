/**
 * Temp File Utilities
 *
 * @module utils/tempFiles
 */

import * as fs from 'node:fs';
import { LogEngine } from '../config/logger';
import { TempFilePair } from '../types/videoNote';

/**
 * Removes a temp file; a path that was never created is not an error
 */
export async function removeTempFile(filePath: string): Promise<void> {
	try {
		await fs.promises.rm(filePath, { force: true });
	}
	catch (error) {
		LogEngine.warn(`Failed to remove temp file ${filePath}:`, error instanceof Error ? error.message : String(error));
	}
}

/**
 * Removes both files of a request
 */
export async function removeTempFiles(paths: TempFilePair): Promise<void> {
	await Promise.all([
		removeTempFile(paths.inputPath),
		removeTempFile(paths.outputPath),
	]);
}
