/**
 * Webhook Service Module
 *
 * Express application receiving Telegram updates in webhook mode.
 *
 * Features:
 * - Update endpoint backed by grammy's webhookCallback
 * - Secret token verification (X-Telegram-Bot-Api-Secret-Token) when WEBHOOK_SECRET is set
 * - Health check endpoint for container orchestration
 *
 * Updates are acknowledged as soon as the message handler returns. Video
 * processing continues in the background, so long transcodes never run into
 * Telegram's webhook timeout.
 *
 * @module services/webhook
 */

import express, { Express, Request, Response } from 'express';
import { Bot, webhookCallback } from 'grammy';
import { LogEngine } from '../config/logger';

/**
 * Options for building the webhook application
 */
export interface WebhookAppOptions {
	/** Route the updates are posted to */
	path: string;
	/** Shared secret Telegram sends back in every request */
	secretToken?: string;
}

/**
 * Health check endpoint for the webhook service
 * Returns basic operational status without exposing sensitive system details
 */
async function webhookHealthCheck(_req: Request, res: Response): Promise<void> {
	try {
		res.status(200).json({
			status: 'healthy',
			timestamp: new Date().toISOString(),
		});
	}
	catch (error) {
		LogEngine.error('Webhook health check failed:', error);
		res.status(503).json({
			status: 'unhealthy',
			timestamp: new Date().toISOString(),
		});
	}
}

/**
 * Builds the express app serving the webhook and health endpoints
 */
function createWebhookApp(bot: Bot, options: WebhookAppOptions): Express {
	const app = express();

	app.use(express.json());
	app.get('/health', webhookHealthCheck);
	app.post(options.path, webhookCallback(bot, 'express', { secretToken: options.secretToken }));

	if (!options.secretToken) {
		LogEngine.warn('WEBHOOK_SECRET not configured - webhook requests are not authenticated');
	}

	return app;
}

/**
 * Webhook service exports
 */
export {
	createWebhookApp,
	webhookHealthCheck,
};
