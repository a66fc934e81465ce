/**
 * Video Note Pipeline
 *
 * Turns one inbound video message into a video note sent back to the same chat,
 * or into a single error message when any step fails.
 *
 * 🔄 PROCESSING FLOW:
 * ==================
 * 1. Resolve the attachment (video, then document)
 * 2. Normalize the file name
 * 3. Look up the remote file path with getFile
 * 4. Download to `input_<chat>_<message>_<name>`
 * 5. Transcode to `output_<chat>_<message>_<name>`
 * 6. Upload the result with sendVideoNote
 * 7. Remove both temp files, whatever happened
 *
 * Every step handles its own failure: the error is logged, one fixed text is
 * sent to the user and the request ends. Nothing is retried, and nothing is
 * thrown back to the dispatcher.
 *
 * Once the shutdown signal has fired no new step is started. ffmpeg and the
 * download are aborted by the same signal; Bot API calls run to completion.
 *
 * @module services/videoNotePipeline
 */

import { InputFile } from 'grammy';
import { LogEngine } from '../config/logger';
import { VIDEO_NOTE_CONFIG } from '../config/videoNoteConfig';
import { InboundMessage, VideoNoteApi } from '../types/telegram';
import { RequestOutcome, TempFilePair, VideoNoteProcessingResult } from '../types/videoNote';
import { AttachmentDetectionService } from './attachmentDetection';
import { downloadTelegramFile, openForUpload } from './fileTransfer';
import { transcodeToVideoNote } from './transcoder';
import { getErrorMessage, isVideoNotesForbiddenError, sendBestEffort } from '../utils/messageUtils';
import { removeTempFiles } from '../utils/tempFiles';

/**
 * Settings shared by every request
 */
export interface VideoNotePipelineOptions {
	/** Bot token, needed for the file download URL */
	token: string;
	/** Bot API base URL */
	apiBase: string;
	tempDir: string;
	/** Side length of the produced video note */
	videoNoteSize: number;
	ffmpegPath: string;
}

export class VideoNotePipeline {
	constructor(
		private readonly api: VideoNoteApi,
		private readonly options: VideoNotePipelineOptions,
	) {}

	/**
	 * Processes one message end to end
	 *
	 * Never rejects: every failure is reported to the user and reflected in the result.
	 */
	async process(message: InboundMessage, signal?: AbortSignal): Promise<VideoNoteProcessingResult> {
		const startTime = Date.now();
		const chatId = message.chat.id;

		const finish = (outcome: RequestOutcome, error?: unknown): VideoNoteProcessingResult => {
			const processingTime = Date.now() - startTime;
			if (outcome === 'success') {
				LogEngine.info(`Video note for chat ${chatId} sent in ${processingTime}ms`);
			}
			else {
				LogEngine.info(`Request from chat ${chatId} ended with ${outcome} after ${processingTime}ms`);
			}
			return error === undefined
				? { outcome, processingTime }
				: { outcome, processingTime, error: getErrorMessage(error) };
		};

		const attachment = AttachmentDetectionService.resolveAttachment(message);

		switch (attachment.kind) {
		case 'none':
			LogEngine.warn(`Message ${message.message_id} in chat ${chatId} has no video or document`);
			await sendBestEffort(this.api, chatId, VIDEO_NOTE_CONFIG.errorMessages.invalidVideo);
			return finish('validation_failure');
		case 'video':
		case 'document':
			break;
		}

		const fileName = AttachmentDetectionService.normalizeFileName(attachment.fileName);
		LogEngine.info(`Processing ${attachment.kind} "${fileName}" from chat ${chatId}`);

		let remotePath: string;
		try {
			const file = await this.api.getFile(attachment.fileId);
			if (!file.file_path) {
				throw new Error(`File ${attachment.fileId} has no downloadable path`);
			}
			remotePath = file.file_path;
		}
		catch (error) {
			LogEngine.error('Error getting file:', getErrorMessage(error));
			await sendBestEffort(this.api, chatId, VIDEO_NOTE_CONFIG.errorMessages.processingFailed);
			return finish('download_failure', error);
		}

		const paths = AttachmentDetectionService.buildTempFilePaths(
			this.options.tempDir,
			chatId,
			message.message_id,
			fileName,
		);

		try {
			return await this.processFile(chatId, remotePath, fileName, paths, finish, signal);
		}
		finally {
			await removeTempFiles(paths);
		}
	}

	/**
	 * Download, transcode and upload steps; temp file removal is left to the caller
	 */
	private async processFile(
		chatId: number,
		remotePath: string,
		fileName: string,
		paths: TempFilePair,
		finish: (outcome: RequestOutcome, error?: unknown) => VideoNoteProcessingResult,
		signal?: AbortSignal,
	): Promise<VideoNoteProcessingResult> {
		const { errorMessages, progressMessages } = VIDEO_NOTE_CONFIG;

		try {
			signal?.throwIfAborted();
			LogEngine.debug(`Downloading video to ${paths.inputPath}`);
			await downloadTelegramFile({
				apiBase: this.options.apiBase,
				token: this.options.token,
				remotePath,
				destinationPath: paths.inputPath,
				signal,
			});
		}
		catch (error) {
			LogEngine.error('Error downloading file:', getErrorMessage(error));
			await sendBestEffort(this.api, chatId, errorMessages.downloadFailed);
			return finish('download_failure', error);
		}

		await sendBestEffort(this.api, chatId, progressMessages.downloaded);

		try {
			signal?.throwIfAborted();
			await transcodeToVideoNote(paths.inputPath, paths.outputPath, {
				size: this.options.videoNoteSize,
				ffmpegPath: this.options.ffmpegPath,
				signal,
			});
		}
		catch (error) {
			LogEngine.error('Error processing video:', getErrorMessage(error));
			await sendBestEffort(this.api, chatId, errorMessages.processingFailed);
			return finish('transcode_failure', error);
		}

		await sendBestEffort(this.api, chatId, progressMessages.processed);

		try {
			signal?.throwIfAborted();
			const stream = await openForUpload(paths.outputPath);
			try {
				await this.api.sendVideoNote(chatId, new InputFile(stream, fileName), {
					length: this.options.videoNoteSize,
				});
			}
			finally {
				stream.destroy();
			}
		}
		catch (error) {
			LogEngine.error('Error sending video note:', getErrorMessage(error));
			if (isVideoNotesForbiddenError(error)) {
				LogEngine.warn(`Chat ${chatId} does not allow video notes`);
				await sendBestEffort(this.api, chatId, errorMessages.videoNotesForbidden);
			}
			else {
				await sendBestEffort(this.api, chatId, errorMessages.sendFailed);
			}
			return finish('upload_failure', error);
		}

		return finish('success');
	}
}
