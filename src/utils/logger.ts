/**
 * Logger module: structured application logging
 *
 * Provides a preconfigured Winston logger used across the engine.
 * It writes plain-text logs to files and colorized human-readable logs
 * to the console (console output is silenced during tests).
 *
 * Transports
 * - File (errors): `logs/error-YYYY-MM-DD-HHMMSS.log` at level `error`
 * - File (app):    `logs/app-YYYY-MM-DD-HHMMSS.log` at level `debug`
 * - Console: colorized output at `LOG_LEVEL` (default `info`), silent when
 *   `process.env.NODE_TEST_CONTEXT` is set
 *
 * Usage
 * ```ts
 * import logger from "./utils/logger.js";
 *
 * logger.info("Floor %s generated", "cave-1");
 * logger.debug("Placed entity", { id: "mob-3", x: 4, y: 2 });
 * await logger.block("bestiary", () => loadBestiary());
 * ```
 *
 * Notes
 * - File transports are only attached outside test runs so that
 *   `npm test` leaves nothing behind in `logs/`.
 *
 * @module utils/logger
 */
import winston from "winston";
import path from "path";
import { getSafeRootDirectory } from "./path.js";

const isTestMode = Boolean(process.env.NODE_TEST_CONTEXT);

// Generate timestamp for log filenames (YYYY-MM-DD-HHMMSS)
const timestamp = new Date().toISOString().split("T");
const date = timestamp[0];
const HMS = timestamp[1].split(".")[0].split(":").join("");

const LOG_DIRECTORY = path.join(getSafeRootDirectory(), "logs");

const plainLine = winston.format.printf(
	({ timestamp, level, message, ...meta }) =>
		`[${timestamp}] ${level.toUpperCase()}: ${message}${
			Object.keys(meta).length ? " " + JSON.stringify(meta) : ""
		}`
);

function fileTransport(name: string, level: string) {
	return new winston.transports.File({
		filename: path.join(LOG_DIRECTORY, `${name}-${date}-${HMS}.log`),
		level,
		format: winston.format.combine(
			winston.format.uncolorize(),
			winston.format.timestamp({ format: "YYYY-MM-DD HH:mm:ss" }),
			plainLine
		),
	});
}

const base = winston.createLogger({
	level: "debug",
	format: winston.format.combine(
		winston.format.timestamp({ format: "YYYY-MM-DD HH:mm:ss" }),
		winston.format.errors({ stack: true }),
		winston.format.splat(),
		winston.format.json()
	),
	transports: [
		...(isTestMode ? [] : [fileTransport("error", "error"), fileTransport("app", "debug")]),
		new winston.transports.Console({
			level: process.env.LOG_LEVEL || "info",
			silent: isTestMode,
			format: winston.format.combine(
				winston.format.colorize(),
				winston.format.timestamp({ format: "HH:mm:ss" }),
				winston.format.printf(
					({ timestamp, level, message, ...meta }) =>
						`[${timestamp}] ${level}: ${message}${
							Object.keys(meta).length ? " " + JSON.stringify(meta) : ""
						}`
				)
			),
		}),
	],
});

/**
 * Runs a named step and logs how long it took. Errors are logged and
 * rethrown.
 */
async function block<T>(label: string, fn: () => T | Promise<T>): Promise<T> {
	const started = Date.now();
	base.debug(`> ${label}`);
	try {
		const result = await fn();
		base.debug(`< ${label} (${Date.now() - started}ms)`);
		return result;
	} catch (error) {
		base.error(`! ${label} failed after ${Date.now() - started}ms`, {
			error: error instanceof Error ? error.message : String(error),
		});
		throw error;
	}
}

const logger: winston.Logger & { block: typeof block } = Object.assign(base, {
	block,
});

export default logger;
