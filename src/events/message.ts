import { LogEngine } from '../config/logger';
import { VIDEO_NOTE_CONFIG } from '../config/videoNoteConfig';
import { AttachmentDetectionService } from '../services/attachmentDetection';
import { VideoNotePipeline, VideoNotePipelineOptions } from '../services/videoNotePipeline';
import { MessageContext } from '../types/telegram';
import { getErrorMessage } from '../utils/messageUtils';

/**
 * Message Event Handler
 *
 * Entry point for every incoming Telegram message.
 *
 * Key responsibilities:
 * 1. Hands video and document messages to the video note pipeline
 * 2. Replies with usage instructions to everything else
 *
 * Pipeline runs are started without being awaited: the handler returns right
 * away so the next update is not held up by a long transcode. Each run reports
 * back to its chat on its own and never throws into the update loop.
 *
 * @module events/message
 *
 * @event message - Triggered for every message update
 */
export const name = 'message';

/**
 * Handles one message update
 *
 * @param ctx - Update context with the message and the Bot API
 * @param options - Pipeline settings
 * @param signal - Process-wide shutdown signal, passed on to the pipeline
 *
 * @debug
 * If videos aren't processed:
 * 1. Check the message carries `video` or `document` (photos and video notes don't)
 * 2. Look for "Error downloading file" or "Error processing video" in the logs
 */
export async function execute(
	ctx: MessageContext,
	options: VideoNotePipelineOptions,
	signal?: AbortSignal,
): Promise<void> {
	const { message } = ctx;

	if (AttachmentDetectionService.hasVideoAttachment(message)) {
		const pipeline = new VideoNotePipeline(ctx.api, options);
		void pipeline.process(message, signal).catch((error: unknown) => {
			LogEngine.error(`Unexpected error processing message ${message.message_id}:`, getErrorMessage(error));
		});
		return;
	}

	try {
		await ctx.reply(VIDEO_NOTE_CONFIG.instructionMessage);
	}
	catch (replyError) {
		LogEngine.debug('Could not reply to message:', getErrorMessage(replyError));
	}
}
