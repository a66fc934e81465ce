/**
 * File Transfer Service
 *
 * Moves video files between Telegram's file storage and the local temp directory.
 *
 * - downloadTelegramFile(): streams a remote file into a local path
 * - openForUpload(): opens a local file as a read stream for sendVideoNote
 *
 * Bodies are piped straight to disk instead of being buffered in memory, since
 * videos can be large. The bot token is part of the download URL and is kept out
 * of every log line and error message.
 *
 * @module services/fileTransfer
 */

import * as fs from 'node:fs';
import { pipeline } from 'node:stream/promises';
import fetch from 'node-fetch';
import { LogEngine } from '../config/logger';

/**
 * Raised when a remote file can't be fetched or written locally
 */
export class DownloadError extends Error {
	/** HTTP status of the failed response, when one was received */
	readonly status?: number;

	constructor(message: string, details: { status?: number; cause?: unknown } = {}) {
		super(message, { cause: details.cause });
		this.name = 'DownloadError';
		this.status = details.status;
	}
}

/**
 * Where and how to download a Telegram file
 */
export interface DownloadRequest {
	/** Bot API base URL, e.g. https://api.telegram.org */
	apiBase: string;
	token: string;
	/** `file_path` returned by getFile */
	remotePath: string;
	/** Local file to create or truncate */
	destinationPath: string;
	signal?: AbortSignal;
}

/**
 * Builds the download URL of a Telegram file
 */
export function buildFileUrl(apiBase: string, token: string, remotePath: string): string {
	return `${apiBase.replace(/\/+$/, '')}/file/bot${token}/${remotePath.replace(/^\/+/, '')}`;
}

function redactToken(input: string, token: string): string {
	if (!token || !input.includes(token)) return input;
	return input.split(token).join('<redacted>');
}

/**
 * Downloads a Telegram file to a local path, writing the body verbatim
 *
 * @throws {DownloadError} On a network error, a non-2xx response or a write failure
 */
export async function downloadTelegramFile(request: DownloadRequest): Promise<void> {
	const { apiBase, token, remotePath, destinationPath, signal } = request;
	LogEngine.debug(`Downloading ${remotePath} to ${destinationPath}`);

	try {
		const response = await fetch(buildFileUrl(apiBase, token, remotePath), { method: 'GET', signal });

		if (!response.ok) {
			throw new DownloadError(
				`Failed to download ${remotePath}: ${response.status} ${response.statusText}`,
				{ status: response.status },
			);
		}

		await pipeline(response.body, fs.createWriteStream(destinationPath));
		LogEngine.debug(`Downloaded ${remotePath} to ${destinationPath}`);
	}
	catch (error) {
		if (error instanceof DownloadError) {
			throw error;
		}
		const message = error instanceof Error ? error.message : String(error);
		throw new DownloadError(`Failed to download ${remotePath}: ${redactToken(message, token)}`);
	}
}

/**
 * Opens a local file for upload, positioned at its first byte
 *
 * Resolves once the file is open, so a missing file rejects here instead of
 * surfacing later inside the upload. The caller destroys the stream when done.
 */
export async function openForUpload(filePath: string): Promise<fs.ReadStream> {
	const handle = await fs.promises.open(filePath, 'r');
	return handle.createReadStream({ start: 0 });
}
