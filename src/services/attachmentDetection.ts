/**
 * Attachment Detection Service
 *
 * Decides whether an inbound message carries something that can become a video
 * note, and turns the client-supplied display name into a safe temp file name.
 *
 * Detection order mirrors what Telegram clients send:
 * 1. `video` - sent with the in-app video picker
 * 2. `document` - sent as a file, kept uncompressed
 *
 * Documents are not filtered by MIME type; a non-video document fails later at
 * the transcode step with the usual processing error.
 *
 * @module services/attachmentDetection
 */

import * as path from 'node:path';
import { InboundMessage } from '../types/telegram';
import { AttachmentResolution, TempFilePair } from '../types/videoNote';
import { VIDEO_NOTE_CONFIG } from '../config/videoNoteConfig';

export class AttachmentDetectionService {
	/**
	 * Resolves the attachment a message carries, preferring `video` over `document`
	 */
	static resolveAttachment(message: InboundMessage): AttachmentResolution {
		if (message.video) {
			return {
				kind: 'video',
				fileId: message.video.file_id,
				fileName: message.video.file_name,
			};
		}

		if (message.document) {
			return {
				kind: 'document',
				fileId: message.document.file_id,
				fileName: message.document.file_name,
			};
		}

		return { kind: 'none' };
	}

	/**
	 * Whether the message should be handed to the request pipeline
	 */
	static hasVideoAttachment(message: InboundMessage): boolean {
		return AttachmentDetectionService.resolveAttachment(message).kind !== 'none';
	}

	/**
	 * Normalizes a display name for use in temp file names
	 *
	 * Missing names become `video.mp4`, names without a dot get `.mp4`.
	 * Directory parts are dropped so the name can't point outside the temp directory.
	 */
	static normalizeFileName(fileName: string | undefined): string {
		const baseName = path.basename((fileName ?? '').replace(/\\/g, '/')).trim();

		if (baseName === '' || baseName === '.' || baseName === '..') {
			return VIDEO_NOTE_CONFIG.defaultFileName;
		}

		// A leading dot counts as an extension: `.mp4` stays as it is
		if (!baseName.includes('.')) {
			return `${baseName}${VIDEO_NOTE_CONFIG.defaultExtension}`;
		}

		return baseName;
	}

	/**
	 * Builds the temp paths one request owns
	 *
	 * Chat id and message id together identify the request, so neither two chats
	 * nor two messages in one chat sending the same file name share a path.
	 */
	static buildTempFilePaths(
		tempDir: string,
		chatId: number,
		messageId: number,
		fileName: string,
	): TempFilePair {
		const { input, output } = VIDEO_NOTE_CONFIG.tempFilePrefixes;
		const suffix = `${chatId}_${messageId}_${fileName}`;

		return {
			inputPath: path.join(tempDir, `${input}_${suffix}`),
			outputPath: path.join(tempDir, `${output}_${suffix}`),
		};
	}
}
