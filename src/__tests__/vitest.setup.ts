/**
 * Vitest Setup File
 *
 * Global mocking and test environment setup for the bot. Loaded before all
 * tests run, so no test talks to Telegram or prints log output.
 *
 * Mocked Systems:
 * - LogEngine: Logging system mocking
 * - dotenv: No .env file is read during tests
 *
 * Child processes and HTTP downloads are mocked per test file.
 *
 * @module __tests__/vitest.setup
 */

import { vi, beforeEach } from 'vitest';

// =============================================================================
// ENVIRONMENT SETUP
// =============================================================================

process.env.NODE_ENV = 'test';
process.env.BOT_TOKEN = 'test-token';

// =============================================================================
// LOGENGINE MOCKING
// =============================================================================

vi.mock('@wgtechlabs/log-engine', () => ({
	LogEngine: {
		info: vi.fn(),
		debug: vi.fn(),
		warn: vi.fn(),
		error: vi.fn(),
		configure: vi.fn(),
	},
	LogMode: {
		DEBUG: 'debug',
		INFO: 'info',
		WARN: 'warn',
		ERROR: 'error',
	},
}));

// =============================================================================
// DOTENV MOCKING
// =============================================================================

vi.mock('dotenv', () => ({
	config: vi.fn(),
}));

// =============================================================================
// TEST LIFECYCLE HOOKS
// =============================================================================

beforeEach(() => {
	vi.clearAllMocks();
});
