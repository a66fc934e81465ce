/**
 * Message Utilities
 *
 * Helpers for the plain-text messages the bot sends alongside video notes.
 *
 * Progress and error notices are best effort: a notice that can't be delivered
 * is logged and dropped. It never turns into a second failure and is never retried.
 *
 * @module utils/messageUtils
 */

import { GrammyError } from 'grammy';
import { LogEngine } from '../config/logger';
import { VideoNoteApi } from '../types/telegram';
import { VIDEO_NOTE_CONFIG } from '../config/videoNoteConfig';

/**
 * Sends a text message, logging instead of throwing on failure
 *
 * @returns Whether the message was accepted by Telegram
 */
export async function sendBestEffort(api: Pick<VideoNoteApi, 'sendMessage'>, chatId: number, text: string): Promise<boolean> {
	try {
		await api.sendMessage(chatId, text);
		return true;
	}
	catch (error) {
		LogEngine.warn(`Could not send message to chat ${chatId}:`, getErrorMessage(error));
		return false;
	}
}

/**
 * Whether an upload failed because the chat forbids voice and video notes
 */
export function isVideoNotesForbiddenError(error: unknown): boolean {
	const forbidden = VIDEO_NOTE_CONFIG.voiceMessagesForbiddenError;

	if (error instanceof GrammyError) {
		return error.description === forbidden;
	}

	return error instanceof Error && error.message.includes(forbidden);
}

/**
 * Extracts a printable message from anything thrown
 */
export function getErrorMessage(error: unknown): string {
	return error instanceof Error ? error.message : String(error);
}
