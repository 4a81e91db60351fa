/**
 * Logger module - structured application logging
 *
 * Provides a preconfigured Winston logger used across the project.
 * It writes plain-text logs with JSON metadata to files and colorized
 * human-readable logs to the console (console output is disabled during tests).
 *
 * Transports
 * - File (errors): `logs/error-YYYY-MM-DD-HHMMSS[.test].log` at level `error`
 * - File (app):    `logs/app-YYYY-MM-DD-HHMMSS[.test].log` at level `debug`
 * - Console: colorized output at `LOG_LEVEL` (default `info`), disabled when
 *   `process.env.NODE_TEST_CONTEXT` is set
 *
 * Usage
 * ```ts
 * import logger from './utils/logger.js';
 *
 * logger.info('Server started on port %d', 4000);
 * logger.error('Command failed', { sessionId, verb, error });
 * await logger.block('world', async () => { ... });
 * ```
 *
 * @module utils/logger
 */
import winston from "winston";
import path from "path";
import { getSafeRootDirectory } from "./path.js";

// node:test sets this in every test process
const isTestMode = process.env.NODE_TEST_CONTEXT;

// Timestamp for log filenames (YYYY-MM-DD + HHMMSS)
const timestamp = new Date().toISOString().split("T");
const date = timestamp[0];
const HMS = timestamp[1].split(".")[0].split(":").join("");
const testSuffix = isTestMode ? ".test" : "";

const LOG_DIRECTORY = path.join(getSafeRootDirectory(), "logs");

const fileFormat = winston.format.combine(
	winston.format.uncolorize(),
	winston.format.timestamp({ format: "YYYY-MM-DD HH:mm:ss" }),
	winston.format.printf(
		({ timestamp, level, message, ...meta }) =>
			`[${timestamp}] ${level.toUpperCase()}: ${message}${
				Object.keys(meta).length ? " " + JSON.stringify(meta) : ""
			}`
	)
);

const base = winston.createLogger({
	level: "debug",
	format: winston.format.combine(
		winston.format.timestamp({ format: "YYYY-MM-DD HH:mm:ss" }),
		winston.format.errors({ stack: true }),
		winston.format.splat(),
		winston.format.json()
	),
	defaultMeta: { service: "ember-mud" },
	transports: [
		new winston.transports.File({
			filename: path.join(
				LOG_DIRECTORY,
				`error-${date}-${HMS}${testSuffix}.log`
			),
			level: "error",
			format: fileFormat,
		}),
		new winston.transports.File({
			filename: path.join(LOG_DIRECTORY, `app-${date}-${HMS}${testSuffix}.log`),
			level: "debug",
			format: fileFormat,
		}),
		...(!isTestMode
			? [
					new winston.transports.Console({
						level: process.env.LOG_LEVEL || "info",
						format: winston.format.combine(
							winston.format.colorize(),
							winston.format.timestamp({ format: "HH:mm:ss" }),
							winston.format.printf(
								({ timestamp, level, message, service, ...meta }) =>
									`[${timestamp}] ${level}: ${message}${
										Object.keys(meta).length ? " " + JSON.stringify(meta) : ""
									}`
							)
						),
					}),
			  ]
			: []),
	],
});

/**
 * Run an async phase and log when it starts and how long it took.
 * Failures are logged with the phase name and rethrown.
 */
async function block<T>(name: string, work: () => Promise<T>): Promise<T> {
	const started = Date.now();
	base.debug(`[${name}] begin`);
	try {
		const result = await work();
		base.debug(`[${name}] done in ${Date.now() - started}ms`);
		return result;
	} catch (error) {
		base.error(`[${name}] failed after ${Date.now() - started}ms`, {
			error: describeError(error),
		});
		throw error;
	}
}

/**
 * Flatten an unknown thrown value into something JSON metadata can carry.
 */
export function describeError(error: unknown): string {
	if (error instanceof Error) return error.stack ?? error.message;
	return String(error);
}

const logger = Object.assign(base, { block });

export default logger;
