/**
 * Bot Runner
 *
 * Starts the bot in the transport mode picked by configuration and stops it
 * when the shutdown signal fires.
 *
 * - polling: grammy's built-in long polling loop
 * - webhook: registers the public URL with Telegram and serves it with express
 *
 * @module services/botRunner
 */

import { Server } from 'node:http';
import { Bot } from 'grammy';
import { AppConfig, buildWebhookUrl, normalizeWebhookPath } from '../config/defaults';
import { LogEngine } from '../config/logger';
import { createWebhookApp } from './webhook';

/**
 * Settings the runner reads from the resolved configuration
 */
export type BotRunnerConfig = Pick<AppConfig, 'BOT_MODE' | 'WEBHOOK_URL' | 'WEBHOOK_PATH' | 'WEBHOOK_SECRET' | 'PORT'>;

/**
 * Runs the bot until `signal` aborts
 *
 * Resolves once the transport has shut down.
 */
export async function startBot(bot: Bot, config: BotRunnerConfig, signal: AbortSignal): Promise<void> {
	if (config.BOT_MODE === 'webhook' && config.WEBHOOK_URL) {
		await startWebhook(bot, { ...config, WEBHOOK_URL: config.WEBHOOK_URL }, signal);
		return;
	}

	await startPolling(bot, signal);
}

async function startPolling(bot: Bot, signal: AbortSignal): Promise<void> {
	const stop = (): void => {
		LogEngine.info('Stopping long polling...');
		bot.stop().catch((error: unknown) => {
			LogEngine.error('Failed to stop long polling:', error instanceof Error ? error.message : String(error));
		});
	};

	if (signal.aborted) return;

	// bot.start() drops a webhook left over from a previous deployment before it polls,
	// and bot.stop() can interrupt it at any point from here on
	signal.addEventListener('abort', stop, { once: true });
	await bot.start({
		onStart: (botInfo) => {
			LogEngine.info(`🚀 Bot @${botInfo.username} started with long polling`);
		},
	});

	signal.removeEventListener('abort', stop);
	LogEngine.info('Long polling stopped');
}

async function startWebhook(
	bot: Bot,
	config: BotRunnerConfig & { WEBHOOK_URL: string },
	signal: AbortSignal,
): Promise<void> {
	const webhookUrl = buildWebhookUrl(config.WEBHOOK_URL, config.WEBHOOK_PATH);

	await bot.init();
	await bot.api.setWebhook(webhookUrl, config.WEBHOOK_SECRET ? { secret_token: config.WEBHOOK_SECRET } : {});
	LogEngine.info(`Webhook registered at ${webhookUrl}`);

	const app = createWebhookApp(bot, {
		path: normalizeWebhookPath(config.WEBHOOK_PATH),
		secretToken: config.WEBHOOK_SECRET,
	});

	await new Promise<void>((resolve, reject) => {
		const server: Server = app.listen(config.PORT, () => {
			LogEngine.info(`🚀 Bot @${bot.botInfo.username} listening for webhooks on port ${config.PORT}`);
		});

		server.on('error', reject);

		const close = (): void => {
			LogEngine.info('Closing webhook server...');
			server.close((error?: Error) => {
				if (error) {
					reject(error);
					return;
				}
				LogEngine.info('Webhook server closed');
				resolve();
			});
		};

		if (signal.aborted) {
			close();
			return;
		}
		signal.addEventListener('abort', close, { once: true });
	});
}
