/**
 * Video Note Bot - Main Entry Point
 *
 * Telegram bot that turns videos into round video notes. Users send a video
 * (or a video file as a document), the bot crops it to a square with ffmpeg
 * and sends it back as a video note in the same chat.
 *
 * 🏗️ ARCHITECTURE OVERVIEW FOR CONTRIBUTORS:
 * ==========================================
 * 1. Bot: grammy client receiving updates by long polling or webhook
 * 2. Message handler: dispatches each video message to its own pipeline run
 * 3. Pipeline: getFile → download → ffmpeg → sendVideoNote → temp file cleanup
 *
 * Data Flow:
 * Telegram → Bot → Pipeline → ffmpeg → Telegram
 *
 * 🔧 DEVELOPMENT SETUP:
 * =====================
 * 1. Copy .env.example to .env and set BOT_TOKEN
 * 2. Make sure ffmpeg is installed and on PATH (or set FFMPEG_PATH)
 * 3. Run `npm install`, `npm run build` then `npm start`
 *
 * 🐛 TROUBLESHOOTING:
 * ==================
 * - Bot not responding? Check BOT_TOKEN, and that no other instance is polling
 * - Webhook mode silent? Verify WEBHOOK_URL is reachable by Telegram over HTTPS
 * - Every video fails to process? Check that ffmpeg runs from the bot's environment
 *
 * Environment Variables:
 * - BOT_TOKEN: Bot token from @BotFather (required)
 * - WEBHOOK_URL: Public base URL; switches the bot to webhook mode (optional)
 * - WEBHOOK_PATH: Webhook route, defaults to /webhook (optional)
 * - WEBHOOK_SECRET: Secret token Telegram sends with every webhook request (optional)
 * - PORT: Webhook listen port, defaults to 8080 (optional)
 * - VIDEO_NOTE_SIZE: Side length of produced video notes, defaults to 640 (optional)
 * - FFMPEG_PATH: ffmpeg executable, defaults to ffmpeg (optional)
 * - TEMP_DIR: Directory for temp files, defaults to the OS temp dir (optional)
 * - NODE_ENV: development enables debug logging, including ffmpeg output
 *
 * @module index
 */

// Load environment variables first, before any other imports
import * as dotenv from 'dotenv';
dotenv.config();

import { Bot } from 'grammy';
import { getAllConfig } from './config/defaults';
import { LogEngine } from './config/logger';
import * as messageEvent from './events/message';
import * as errorEvent from './events/error';
import { startBot } from './services/botRunner';

/**
 * Main startup function
 *
 * Validates configuration, registers handlers and runs the bot until SIGINT or
 * SIGTERM. The shutdown signal is passed to every pipeline run, so running
 * ffmpeg processes and downloads are aborted on shutdown.
 */
async function main(): Promise<void> {
	const config = getAllConfig();

	if (!config.BOT_TOKEN) {
		LogEngine.error('Missing required environment variable: BOT_TOKEN');
		LogEngine.error('Please set BOT_TOKEN to the token issued by @BotFather before starting the bot');
		process.exit(1);
	}

	const shutdown = new AbortController();
	const onSignal = (signalName: NodeJS.Signals): void => {
		if (shutdown.signal.aborted) return;
		LogEngine.info(`Received ${signalName} - shutting down...`);
		shutdown.abort();
	};
	process.once('SIGINT', onSignal);
	process.once('SIGTERM', onSignal);

	const bot = new Bot(config.BOT_TOKEN, {
		client: { apiRoot: config.TELEGRAM_API_BASE },
	});

	const pipelineOptions = {
		token: config.BOT_TOKEN,
		apiBase: config.TELEGRAM_API_BASE,
		tempDir: config.TEMP_DIR,
		videoNoteSize: config.VIDEO_NOTE_SIZE,
		ffmpegPath: config.FFMPEG_PATH,
	};

	bot.on(messageEvent.name, (ctx) => messageEvent.execute(ctx, pipelineOptions, shutdown.signal));
	bot.catch((err) => errorEvent.execute(err));

	LogEngine.info(`Starting bot in ${config.BOT_MODE} mode (video note size ${config.VIDEO_NOTE_SIZE}px)`);
	await startBot(bot, config, shutdown.signal);
	LogEngine.info('Bot stopped');
}

main().catch((error: unknown) => {
	LogEngine.error('Failed to start bot:', error instanceof Error ? error.message : String(error));
	process.exit(1);
});
