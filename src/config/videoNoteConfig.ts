/**
 * Video Note Configuration - Processing Settings
 *
 * @description
 * Centralized constants for turning an inbound video into a Telegram video note:
 * the target frame, file naming defaults, the transcoder filter chain and every
 * user-facing message the bot can send.
 *
 * @module config/videoNoteConfig
 * @since 1.0.0
 *
 * @commonIssues
 * - Video notes rejected: the recipient disallows voice/video messages in privacy settings
 * - Documents that are not videos: they are accepted and fail at the transcode step
 *
 * @dependencies None (pure configuration constants)
 */

export const VIDEO_NOTE_CONFIG = {
	/** Name used when the attachment carries none */
	defaultFileName: 'video.mp4',

	/** Extension appended to names that have none */
	defaultExtension: '.mp4',

	/** Pixel format of the produced stream */
	pixelFormat: 'yuv420p',

	/** Telegram error description returned when the chat forbids voice and video notes */
	voiceMessagesForbiddenError: 'Bad Request: VOICE_MESSAGES_FORBIDDEN',

	/** Prefixes of the per-request temp files */
	tempFilePrefixes: {
		input: 'input',
		output: 'output',
	},

	/** Instruction sent for messages without a video */
	instructionMessage: 'Please send a video file to make it circular.',

	/** Progress messages for user feedback */
	progressMessages: {
		downloaded: 'Video downloaded. Processing...',
		processed: 'Video processed. Sending...',
	},

	/** Error messages for user feedback */
	errorMessages: {
		invalidVideo: 'Please send a valid video file.',
		processingFailed: 'Failed to process the video. Please try again.',
		downloadFailed: 'Failed to download the video. Please try again.',
		sendFailed: 'Failed to send the processed video. Please try again.',
		videoNotesForbidden: 'It seems that I don\'t have permission to send video notes. Please check if you allow sending voice messages in the settings.',
	},
} as const;

/**
 * Builds the ffmpeg video filter: center crop to a square, scale, fix the pixel format
 */
export function buildVideoFilter(size: number): string {
	return `crop=min(iw\\,ih):min(iw\\,ih),scale=${size}:${size},format=${VIDEO_NOTE_CONFIG.pixelFormat}`;
}
