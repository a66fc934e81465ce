/**
 * Default Configuration System
 *
 * Provides production-safe defaults for the video note bot. Environment
 * detection goes through NODE_ENV and every tunable value has a hardcoded
 * default, so only the bot token has to be supplied by the operator.
 *
 * 🎯 FOR CONTRIBUTORS:
 * ===================
 * This module centralizes all default values. When adding a new configurable
 * feature, add its default here rather than hardcoding it at the call site.
 *
 * Configuration Philosophy:
 * - Required vars: Only BOT_TOKEN
 * - Default configs: Hardcoded sensible defaults in this file
 * - Optional overrides: Environment can override defaults when needed
 *
 * 🔧 ADDING NEW CONFIG:
 * ====================
 * 1. Add the default value to DEFAULT_CONFIG object
 * 2. Add the key to getAllConfig()
 * 3. Update .env.example with the new variable
 *
 * 🛠️ ENVIRONMENT DETECTION:
 * =========================
 * - NODE_ENV=development: Enables debug logging (ffmpeg output included)
 * - NODE_ENV=production: Info-level logging
 * - NODE_ENV=test: Used by the test suite
 *
 * @module config/defaults
 */

import * as os from 'node:os';

/**
 * Default configuration values for the bot
 */
export const DEFAULT_CONFIG = {
	// Production-safe defaults
	NODE_ENV: 'production',
	PORT: 8080,

	// Telegram
	TELEGRAM_API_BASE: 'https://api.telegram.org',
	WEBHOOK_PATH: '/webhook',

	// Video processing
	VIDEO_NOTE_SIZE: 640,
	FFMPEG_PATH: 'ffmpeg',
} as const;

/**
 * Transport the bot receives updates through
 */
export type BotMode = 'polling' | 'webhook';

/**
 * Environment detection helper - computed at module load time
 */
export const isDevelopment: boolean = process.env.NODE_ENV === 'development' || !process.env.NODE_ENV;

/**
 * Get configuration value with environment override support
 * @param key - Configuration key (environment variable name)
 * @param defaultValue - Default value if environment variable is not set
 * @returns Configuration value, parsed to the type of the default
 */
export function getConfig(key: string, defaultValue: number): number;
export function getConfig(key: string, defaultValue: boolean): boolean;
export function getConfig(key: string, defaultValue: string): string;
export function getConfig(key: string, defaultValue: string | number | boolean): string | number | boolean {
	const envValue = process.env[key];

	if (envValue !== undefined) {
		if (typeof defaultValue === 'number') {
			const parsed = parseInt(envValue, 10);
			return !isNaN(parsed) ? parsed : defaultValue;
		}

		if (typeof defaultValue === 'boolean') {
			return envValue.toLowerCase() === 'true';
		}

		return envValue;
	}

	return defaultValue;
}

/**
 * Reads an optional variable, treating an empty or blank value as unset
 */
function getOptionalConfig(key: string): string | undefined {
	const value = process.env[key];
	return value && value.trim() !== '' ? value.trim() : undefined;
}

/**
 * Fully resolved runtime configuration
 */
export interface AppConfig {
	NODE_ENV: string;
	BOT_TOKEN: string | undefined;
	BOT_MODE: BotMode;
	WEBHOOK_URL: string | undefined;
	WEBHOOK_PATH: string;
	WEBHOOK_SECRET: string | undefined;
	PORT: number;
	TELEGRAM_API_BASE: string;
	VIDEO_NOTE_SIZE: number;
	FFMPEG_PATH: string;
	TEMP_DIR: string;
	isDevelopment: boolean;
}

/**
 * Get all configuration with environment overrides applied
 *
 * The bot runs in webhook mode as soon as WEBHOOK_URL is set, long polling otherwise.
 */
export function getAllConfig(): AppConfig {
	const webhookUrl = getOptionalConfig('WEBHOOK_URL');

	return {
		NODE_ENV: getConfig('NODE_ENV', DEFAULT_CONFIG.NODE_ENV),
		BOT_TOKEN: getOptionalConfig('BOT_TOKEN'),
		BOT_MODE: webhookUrl ? 'webhook' : 'polling',
		WEBHOOK_URL: webhookUrl,
		WEBHOOK_PATH: getConfig('WEBHOOK_PATH', DEFAULT_CONFIG.WEBHOOK_PATH),
		WEBHOOK_SECRET: getOptionalConfig('WEBHOOK_SECRET'),
		PORT: getConfig('PORT', DEFAULT_CONFIG.PORT),
		TELEGRAM_API_BASE: getConfig('TELEGRAM_API_BASE', DEFAULT_CONFIG.TELEGRAM_API_BASE),
		VIDEO_NOTE_SIZE: getConfig('VIDEO_NOTE_SIZE', DEFAULT_CONFIG.VIDEO_NOTE_SIZE),
		FFMPEG_PATH: getConfig('FFMPEG_PATH', DEFAULT_CONFIG.FFMPEG_PATH),
		TEMP_DIR: getOptionalConfig('TEMP_DIR') ?? os.tmpdir(),
		isDevelopment,
	};
}

/**
 * Makes sure the webhook route starts with a slash
 */
export function normalizeWebhookPath(webhookPath: string): string {
	return webhookPath.startsWith('/') ? webhookPath : `/${webhookPath}`;
}

/**
 * Joins the public webhook base URL and the route path without doubling slashes
 */
export function buildWebhookUrl(baseUrl: string, webhookPath: string): string {
	return `${baseUrl.replace(/\/+$/, '')}${normalizeWebhookPath(webhookPath)}`;
}
