/**
 * Transcoder Service
 *
 * Runs ffmpeg to turn an input video into a square clip suitable for a video note.
 *
 * 🔄 PROCESSING FLOW:
 * ==================
 * 1. Center-crop the frame to min(width, height)
 * 2. Scale to the configured size
 * 3. Convert to yuv420p
 * 4. Copy the audio stream as is
 * 5. Overwrite any existing output file
 *
 * ffmpeg writes its progress to stderr. The stream is read line by line while
 * the process runs; a child whose stderr pipe fills up stops making progress.
 *
 * 🐛 DEBUGGING TRANSCODE ISSUES:
 * =============================
 * - "spawn ffmpeg ENOENT"? ffmpeg is not on PATH, set FFMPEG_PATH
 * - Non-zero exit? Run with NODE_ENV=development to see ffmpeg output
 *
 * @module services/transcoder
 */

import { spawn } from 'node:child_process';
import * as readline from 'node:readline';
import { buildVideoFilter } from '../config/videoNoteConfig';
import { LogEngine } from '../config/logger';
import { TranscodeOptions } from '../types/videoNote';

/**
 * Raised when ffmpeg fails to start, exits unsuccessfully or is aborted
 */
export class TranscodeError extends Error {
	readonly exitCode: number | null;
	readonly signal: NodeJS.Signals | null;

	constructor(
		message: string,
		details: { exitCode?: number | null; signal?: NodeJS.Signals | null; cause?: unknown } = {},
	) {
		super(message, { cause: details.cause });
		this.name = 'TranscodeError';
		this.exitCode = details.exitCode ?? null;
		this.signal = details.signal ?? null;
	}
}

/**
 * Builds the ffmpeg argument list for one input/output pair
 */
export function buildTranscodeArgs(inputPath: string, outputPath: string, size: number): string[] {
	return [
		'-i', inputPath,
		'-vf', buildVideoFilter(size),
		'-c:a', 'copy',
		'-y',
		outputPath,
	];
}

/**
 * Transcodes `inputPath` into a square video at `outputPath`
 *
 * @throws {TranscodeError} When ffmpeg can't be started, exits non-zero, or the signal aborts it
 */
export function transcodeToVideoNote(
	inputPath: string,
	outputPath: string,
	options: TranscodeOptions,
): Promise<void> {
	const args = buildTranscodeArgs(inputPath, outputPath, options.size);
	LogEngine.debug(`Running ${options.ffmpegPath} ${args.join(' ')}`);

	return new Promise<void>((resolve, reject) => {
		let settled = false;
		const settle = (error?: TranscodeError): void => {
			if (settled) return;
			settled = true;
			if (error) {
				reject(error);
			}
			else {
				resolve();
			}
		};

		const child = spawn(options.ffmpegPath, args, {
			stdio: ['ignore', 'ignore', 'pipe'],
			signal: options.signal,
		});

		const stderrLines = readline.createInterface({ input: child.stderr, crlfDelay: Infinity });
		stderrLines.on('line', (line: string) => {
			LogEngine.debug(`FFmpeg: ${line}`);
		});

		child.on('error', (error: Error) => {
			stderrLines.close();
			if (error.name === 'AbortError') {
				settle(new TranscodeError('Transcoding was aborted', { cause: error }));
				return;
			}
			settle(new TranscodeError(`Failed to run ${options.ffmpegPath}: ${error.message}`, { cause: error }));
		});

		child.on('close', (exitCode: number | null, signal: NodeJS.Signals | null) => {
			if (exitCode === 0) {
				settle();
				return;
			}
			const reason = signal ? `was killed by ${signal}` : `exited with code ${exitCode}`;
			settle(new TranscodeError(`${options.ffmpegPath} ${reason}`, { exitCode, signal }));
		});
	});
}
