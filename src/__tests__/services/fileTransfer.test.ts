/**
 * Test Suite: File Transfer Service
 *
 * Tests Telegram file downloads against a mocked node-fetch and local file
 * opening against a real temp directory.
 */

import * as fs from 'node:fs';
import * as path from 'node:path';
import { Readable } from 'node:stream';
import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import fetch, { Response } from 'node-fetch';
import { buildFileUrl, downloadTelegramFile, DownloadError, openForUpload } from '@services/fileTransfer';
import { createTempDir, removeTempDir } from '@tests/test-utils';

vi.mock('node-fetch', () => ({
	default: vi.fn(),
}));

/**
 * Builds the parts of a node-fetch response the download reads
 */
function createMockResponse(status: number, statusText: string, chunks: string[] = []): Response {
	const response = {
		ok: status >= 200 && status < 300,
		status,
		statusText,
		body: Readable.from(chunks.map(chunk => Buffer.from(chunk))),
	};
	return response as unknown as Response;
}

async function readStream(stream: fs.ReadStream): Promise<string> {
	const chunks: Buffer[] = [];
	for await (const chunk of stream) {
		chunks.push(Buffer.isBuffer(chunk) ? chunk : Buffer.from(chunk));
	}
	return Buffer.concat(chunks).toString('utf8');
}

describe('fileTransfer', () => {
	let tempDir: string;

	beforeEach(() => {
		tempDir = createTempDir();
	});

	afterEach(() => {
		removeTempDir(tempDir);
	});

	describe('buildFileUrl', () => {
		it('should template the token into the file URL', () => {
			expect(buildFileUrl('https://api.telegram.org', 'test-token', 'videos/file_1.mp4'))
				.toBe('https://api.telegram.org/file/bottest-token/videos/file_1.mp4');
		});

		it('should not double slashes', () => {
			expect(buildFileUrl('http://localhost:8081/', 'test-token', '/videos/file_1.mp4'))
				.toBe('http://localhost:8081/file/bottest-token/videos/file_1.mp4');
		});
	});

	describe('downloadTelegramFile', () => {
		it('should write the response body verbatim', async () => {
			vi.mocked(fetch).mockResolvedValue(createMockResponse(200, 'OK', ['first-chunk|', 'second-chunk']));
			const destinationPath = path.join(tempDir, 'input.mp4');

			await downloadTelegramFile({
				apiBase: 'https://api.telegram.org',
				token: 'test-token',
				remotePath: 'videos/file_1.mp4',
				destinationPath,
			});

			expect(fs.readFileSync(destinationPath, 'utf8')).toBe('first-chunk|second-chunk');
			expect(fetch).toHaveBeenCalledWith(
				'https://api.telegram.org/file/bottest-token/videos/file_1.mp4',
				{ method: 'GET', signal: undefined },
			);
		});

		it('should truncate an existing destination file', async () => {
			vi.mocked(fetch).mockResolvedValue(createMockResponse(200, 'OK', ['new']));
			const destinationPath = path.join(tempDir, 'input.mp4');
			fs.writeFileSync(destinationPath, 'previous content that is longer');

			await downloadTelegramFile({
				apiBase: 'https://api.telegram.org',
				token: 'test-token',
				remotePath: 'videos/file_1.mp4',
				destinationPath,
			});

			expect(fs.readFileSync(destinationPath, 'utf8')).toBe('new');
		});

		it('should pass the abort signal to fetch', async () => {
			vi.mocked(fetch).mockResolvedValue(createMockResponse(200, 'OK', ['data']));
			const controller = new AbortController();

			await downloadTelegramFile({
				apiBase: 'https://api.telegram.org',
				token: 'test-token',
				remotePath: 'videos/file_1.mp4',
				destinationPath: path.join(tempDir, 'input.mp4'),
				signal: controller.signal,
			});

			expect(vi.mocked(fetch).mock.calls[0][1]).toEqual({ method: 'GET', signal: controller.signal });
		});

		it('should reject with the status on a non-success response', async () => {
			vi.mocked(fetch).mockResolvedValue(createMockResponse(404, 'Not Found'));
			const destinationPath = path.join(tempDir, 'input.mp4');

			const download = downloadTelegramFile({
				apiBase: 'https://api.telegram.org',
				token: 'test-token',
				remotePath: 'videos/file_1.mp4',
				destinationPath,
			});

			await expect(download).rejects.toThrow(DownloadError);
			await expect(download).rejects.toMatchObject({
				message: 'Failed to download videos/file_1.mp4: 404 Not Found',
				status: 404,
			});
			expect(fs.existsSync(destinationPath)).toBe(false);
		});

		it('should keep the token out of network error messages', async () => {
			vi.mocked(fetch).mockRejectedValue(
				new Error('request to https://api.telegram.org/file/bottest-token/videos/file_1.mp4 failed, reason: ECONNRESET'),
			);

			await expect(downloadTelegramFile({
				apiBase: 'https://api.telegram.org',
				token: 'test-token',
				remotePath: 'videos/file_1.mp4',
				destinationPath: path.join(tempDir, 'input.mp4'),
			})).rejects.toThrow(
				'Failed to download videos/file_1.mp4: request to https://api.telegram.org/file/bot<redacted>/videos/file_1.mp4 failed, reason: ECONNRESET',
			);
		});

		it('should reject when the destination cannot be written', async () => {
			vi.mocked(fetch).mockResolvedValue(createMockResponse(200, 'OK', ['data']));

			await expect(downloadTelegramFile({
				apiBase: 'https://api.telegram.org',
				token: 'test-token',
				remotePath: 'videos/file_1.mp4',
				destinationPath: path.join(tempDir, 'missing-dir', 'input.mp4'),
			})).rejects.toThrow(DownloadError);
		});
	});

	describe('openForUpload', () => {
		it('should stream the file from its first byte', async () => {
			const filePath = path.join(tempDir, 'output.mp4');
			fs.writeFileSync(filePath, 'square-video');

			const stream = await openForUpload(filePath);

			expect(await readStream(stream)).toBe('square-video');
		});

		it('should reject when the file does not exist', async () => {
			await expect(openForUpload(path.join(tempDir, 'missing.mp4'))).rejects.toMatchObject({ code: 'ENOENT' });
		});
	});
});
