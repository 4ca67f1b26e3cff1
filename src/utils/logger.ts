/**
 * Logger module: structured application logging
 *
 * Provides a preconfigured Winston logger used across the project.
 * It writes JSON-formatted logs to files and colorized human-readable logs
 * to the console (console output is disabled during tests).
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
 * logger.info('Loaded %d rooms', 17);
 * await logger.block('world', async () => {
 *   await loadWorld();
 * });
 * ```
 *
 * @module utils/logger
 */
import winston from "winston";
import { join } from "path";
import { getSafeRootDirectory } from "./path.js";

const isTestMode = process.env.NODE_TEST_CONTEXT;

// log files are named after the moment the process started
const timestamp = new Date().toISOString().split("T");
const date = timestamp[0];
const HMS = timestamp[1].split(".")[0].split(":").join("");
const testSuffix = isTestMode ? ".test" : "";
const LOG_DIRECTORY = join(getSafeRootDirectory(), "logs");

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
	defaultMeta: { service: "hollow-manor" },
	transports: [
		new winston.transports.File({
			filename: join(LOG_DIRECTORY, `error-${date}-${HMS}${testSuffix}.log`),
			level: "error",
			format: fileFormat,
		}),
		new winston.transports.File({
			filename: join(LOG_DIRECTORY, `app-${date}-${HMS}${testSuffix}.log`),
			level: "debug",
			format: fileFormat,
		}),
		// Disabled during test mode
		...(!isTestMode
			? [
					new winston.transports.Console({
						level: process.env.LOG_LEVEL || "info",
						format: winston.format.combine(
							winston.format.colorize(),
							winston.format.timestamp({ format: "HH:mm:ss" }),
							winston.format.printf(
								({ timestamp, level, message, ...meta }) =>
									`[${timestamp}] ${level}: ${message}${
										Object.keys(meta).length && meta.service === undefined
											? " " + JSON.stringify(meta)
											: ""
									}`
							)
						),
					}),
			  ]
			: []),
	],
});

/**
 * Runs `fn` as a named, timed section of work.
 *
 * Entry and exit are logged at `debug`; failures are logged at `error`
 * and rethrown.
 */
async function block<T>(name: string, fn: () => Promise<T>): Promise<T> {
	const started = Date.now();
	base.debug(`> ${name}`);
	try {
		return await fn();
	} catch (error) {
		base.error(`! ${name} failed: ${error}`);
		throw error;
	} finally {
		base.debug(`< ${name} (${Date.now() - started}ms)`);
	}
}

const logger = Object.assign(base, { block });

export default logger;
