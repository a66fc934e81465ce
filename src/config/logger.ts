/**
 * Log Engine Configuration
 *
 * Configures @wgtechlabs/log-engine for the bot.
 *
 * Configuration:
 * - Uses LogMode.DEBUG when NODE_ENV=development or undefined, otherwise LogMode.INFO
 * - Excludes ISO timestamps (includeIsoTimestamp: false)
 * - Includes local time formatting (includeLocalTime: true)
 *
 * ffmpeg progress output is logged at debug level, so it only shows up in development.
 *
 * @module config/logger
 */

import { LogEngine, LogMode } from '@wgtechlabs/log-engine';
import { isDevelopment } from './defaults';

const logMode = isDevelopment ? LogMode.DEBUG : LogMode.INFO;

LogEngine.configure({
	mode: logMode,
	format: {
		includeIsoTimestamp: false,
		includeLocalTime: true,
	},
});

export { LogEngine };

// Re-export LogMode for convenience
export { LogMode };
