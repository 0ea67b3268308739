/**
 * File logger shared by the viewport, the terminal and the stream pump.
 *
 * Entries go to `<logs dir>/streamview.YYYY-MM-DD.log` as JSON lines, rotated at
 * 10 MB with five gzipped files kept. The level comes from STREAMVIEW_LOG_LEVEL.
 */
import * as fs from "node:fs";
import winston from "winston";
import DailyRotateFile from "winston-daily-rotate-file";
import { APP_NAME, getLogsDir } from "./dirs";

type Level = "error" | "warn" | "debug";
type Context = Record<string, unknown>;

/** Operations slower than this are logged as warnings instead of debug entries */
const SLOW_OPERATION_MS = 5;

const RESERVED_KEYS = new Set(["timestamp", "level", "message"]);

const jsonLine = winston.format.printf(({ timestamp, level, message, ...meta }) => {
	const entry: Context = { timestamp, level, pid: process.pid, message };
	for (const [key, value] of Object.entries(meta)) {
		if (!RESERVED_KEYS.has(key)) entry[key] = value;
	}
	return JSON.stringify(entry);
});

function createWinstonLogger(): winston.Logger {
	const dirname = getLogsDir();
	fs.mkdirSync(dirname, { recursive: true });
	return winston.createLogger({
		level: process.env.STREAMVIEW_LOG_LEVEL || "debug",
		format: winston.format.combine(winston.format.timestamp(), jsonLine),
		transports: [
			new DailyRotateFile({
				dirname,
				filename: `${APP_NAME}.%DATE%.log`,
				datePattern: "YYYY-MM-DD",
				maxSize: "10m",
				maxFiles: 5,
				zippedArchive: true,
			}),
		],
		exitOnError: false,
	});
}

const sink = createWinstonLogger();

function write(level: Level, message: string, context?: Context): void {
	try {
		sink.log(level, message, context);
	} catch {
		// A broken log file must not take the renderer down with it
	}
}

export function error(message: string, context?: Context): void {
	write("error", message, context);
}

export function warn(message: string, context?: Context): void {
	write("warn", message, context);
}

export function debug(message: string, context?: Context): void {
	write("debug", message, context);
}

/**
 * Run `fn` and log how long it took under `op`. The result (or the thrown error) is
 * passed through untouched.
 *
 * @example
 * ```typescript
 * const wrapped = logger.time("viewport:full-wrap", () => wrapText(content, width));
 * ```
 */
export function time<T>(op: string, fn: () => T): T {
	const start = performance.now();
	try {
		return fn();
	} finally {
		const duration = Math.round((performance.now() - start) * 100) / 100;
		write(duration > SLOW_OPERATION_MS ? "warn" : "debug", `${op} done`, { op, duration });
	}
}
