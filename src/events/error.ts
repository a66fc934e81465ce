import { GrammyError, HttpError } from 'grammy';
import { LogEngine } from '../config/logger';

/**
 * Bot Error Handler - Global Error Management
 *
 * @description
 * Registered with `bot.catch()`. Receives errors that escape a middleware while
 * an update is handled, so a single broken update never stops the update loop.
 * Video processing errors don't arrive here: the pipeline reports those itself.
 *
 * @module events/error
 * @since 1.0.0
 *
 * @commonIssues
 * - GrammyError: the Bot API rejected a call (blocked by user, chat not found)
 * - HttpError: Telegram could not be reached
 *
 * @troubleshooting
 * - Check the update id in the log line against the webhook or polling logs
 * - Verify BOT_TOKEN if every call fails with 401
 */

/**
 * Error raised while handling an update, as passed to `bot.catch()`
 */
export interface UpdateHandlingError {
	error: unknown;
	ctx: {
		update: {
			update_id: number;
		};
	};
}

/**
 * Logs an update handling error with its update id
 */
export function execute(err: UpdateHandlingError): void {
	const updateId = err.ctx.update.update_id;
	const { error } = err;

	if (error instanceof GrammyError) {
		LogEngine.error(`Bot API error while handling update ${updateId}: ${error.description}`);
	}
	else if (error instanceof HttpError) {
		LogEngine.error(`Could not contact Telegram while handling update ${updateId}: ${error.message}`);
	}
	else if (error instanceof Error) {
		LogEngine.error(`Error while handling update ${updateId}: ${error.stack || error.message}`);
	}
	else {
		LogEngine.error(`Error while handling update ${updateId}: ${String(error)}`);
	}
}
