/**
 * Telegram Bot Type Definitions
 *
 * Structural views of the parts of the Telegram Bot API this bot relies on.
 * grammy's own `Message`, `Api` and `Context` types satisfy these interfaces,
 * which keeps the pipeline testable with plain objects.
 *
 * @module types/telegram
 */

import type { InputFile } from 'grammy';

/**
 * File payload carried by a video or document message
 */
export interface TelegramFilePayload {
	/** Opaque identifier used to fetch the file */
	file_id: string;
	/** Original file name, when the client sent one */
	file_name?: string;
}

/**
 * Subset of a Telegram message read by the bot
 */
export interface InboundMessage {
	message_id: number;
	chat: {
		id: number;
	};
	video?: TelegramFilePayload;
	document?: TelegramFilePayload;
}

/**
 * Result of the getFile metadata lookup
 */
export interface TelegramFile {
	file_id: string;
	/** Path relative to the file download base URL, absent when the file is not downloadable */
	file_path?: string;
}

/**
 * Bot API methods used by the request pipeline
 */
export interface VideoNoteApi {
	getFile(fileId: string): Promise<TelegramFile>;
	sendMessage(chatId: number, text: string): Promise<unknown>;
	sendVideoNote(chatId: number, videoNote: InputFile, other: { length: number }): Promise<unknown>;
}

/**
 * Update context handed to the message handler
 */
export interface MessageContext {
	message: InboundMessage;
	api: VideoNoteApi;
	reply(text: string): Promise<unknown>;
}
