/**
 * Test Suite: Message Utilities
 *
 * Tests best-effort message delivery and upload error classification.
 */

import { describe, it, expect, vi } from 'vitest';
import { GrammyError } from 'grammy';
import { LogEngine } from '@config/logger';
import { sendBestEffort, isVideoNotesForbiddenError, getErrorMessage } from '@utils/messageUtils';

function createApiError(description: string, errorCode = 400): GrammyError {
	return new GrammyError(
		`Call to 'sendVideoNote' failed! (${errorCode}: ${description})`,
		{ ok: false, error_code: errorCode, description },
		'sendVideoNote',
		{},
	);
}

describe('messageUtils', () => {
	describe('sendBestEffort', () => {
		it('should send the text and report success', async () => {
			const api = { sendMessage: vi.fn().mockResolvedValue({ message_id: 1 }) };

			const sent = await sendBestEffort(api, 42, 'Video downloaded. Processing...');

			expect(sent).toBe(true);
			expect(api.sendMessage).toHaveBeenCalledWith(42, 'Video downloaded. Processing...');
		});

		it('should log and report failure instead of throwing', async () => {
			const api = { sendMessage: vi.fn().mockRejectedValue(new Error('Forbidden: bot was blocked by the user')) };

			const sent = await sendBestEffort(api, 42, 'Video processed. Sending...');

			expect(sent).toBe(false);
			expect(LogEngine.warn).toHaveBeenCalledWith(
				'Could not send message to chat 42:',
				'Forbidden: bot was blocked by the user',
			);
		});
	});

	describe('isVideoNotesForbiddenError', () => {
		it('should match the Bot API description exactly', () => {
			expect(isVideoNotesForbiddenError(createApiError('Bad Request: VOICE_MESSAGES_FORBIDDEN'))).toBe(true);
		});

		it('should not match other Bot API errors', () => {
			expect(isVideoNotesForbiddenError(createApiError('Bad Request: chat not found'))).toBe(false);
			expect(isVideoNotesForbiddenError(createApiError('Forbidden: bot was blocked by the user', 403))).toBe(false);
		});

		it('should match plain errors carrying the description', () => {
			expect(isVideoNotesForbiddenError(new Error('Call failed: Bad Request: VOICE_MESSAGES_FORBIDDEN'))).toBe(true);
		});

		it('should not match non-errors', () => {
			expect(isVideoNotesForbiddenError('Bad Request: VOICE_MESSAGES_FORBIDDEN')).toBe(false);
			expect(isVideoNotesForbiddenError(undefined)).toBe(false);
		});
	});

	describe('getErrorMessage', () => {
		it('should use the message of an Error', () => {
			expect(getErrorMessage(new Error('boom'))).toBe('boom');
		});

		it('should stringify anything else', () => {
			expect(getErrorMessage('plain failure')).toBe('plain failure');
			expect(getErrorMessage(404)).toBe('404');
		});
	});
});
