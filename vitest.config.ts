/**
 * Vitest Configuration
 *
 * Testing setup for the video note bot with TypeScript path mapping and
 * v8 coverage reporting.
 *
 * Key Features:
 * - V8 coverage provider
 * - TypeScript path mapping for clean imports
 * - Global LogEngine mock through the setup file
 *
 * @see https://vitest.dev/config/
 */

import { defineConfig } from 'vitest/config';
import { resolve } from 'path';

export default defineConfig({
	test: {
		// Test environment setup
		globals: true,
		environment: 'node',
		setupFiles: ['./src/__tests__/vitest.setup.ts'],

		// Test file patterns
		include: ['src/**/*.{test,spec}.ts'],
		exclude: [
			'node_modules',
			'dist',
			'coverage',
		],

		// Coverage configuration with v8 provider
		coverage: {
			provider: 'v8',
			reporter: ['text', 'json-summary', 'lcov'],
			exclude: [
				'node_modules',
				'dist',
				'coverage',
				'**/*.d.ts',
				'**/*.config.ts',
				'src/__tests__/**',
				// Exclude main entry point (difficult to test in isolation)
				'src/index.ts',
			],
			reportsDirectory: './coverage',
		},

		testTimeout: 10000,
		hookTimeout: 10000,
		teardownTimeout: 5000,
		isolate: true,
	},

	// TypeScript path mapping for clean imports
	resolve: {
		alias: {
			'@': resolve(__dirname, './src'),
			'@tests': resolve(__dirname, './src/__tests__'),
			'@utils': resolve(__dirname, './src/utils'),
			'@services': resolve(__dirname, './src/services'),
			'@config': resolve(__dirname, './src/config'),
			'@events': resolve(__dirname, './src/events'),
		},
	},
});
