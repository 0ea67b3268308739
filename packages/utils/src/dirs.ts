/**
 * Centralized path helpers for streamview directories.
 *
 * Uses STREAMVIEW_CONFIG_DIR (default ".streamview") for the config root and
 * STREAMVIEW_LOG_DIR to move the logs elsewhere.
 */

import * as fs from "node:fs";
import * as os from "node:os";
import * as path from "node:path";
import packageJson from "../package.json" with { type: "json" };

/** App name (e.g. "streamview") */
export const APP_NAME: string = "streamview";

/** Config directory name (e.g. ".streamview") */
export const CONFIG_DIR_NAME: string = ".streamview";

/** Version (e.g. "1.0.0") */
export const VERSION: string = packageJson.version;

/**
 * On macOS, strip /private prefix only when both paths resolve to the same location.
 * This preserves aliases like /private/tmp -> /tmp without rewriting unrelated paths.
 */
function standardizeMacOSPath(p: string): string {
	if (process.platform !== "darwin" || !p.startsWith("/private/")) return p;
	const stripped = p.slice("/private".length);
	try {
		if (fs.realpathSync(p) === fs.realpathSync(stripped)) {
			return stripped;
		}
	} catch {
		// Either side missing; keep the original path
	}
	return p;
}

let projectDir = standardizeMacOSPath(process.cwd());

/** Get the project directory. */
export function getProjectDir(): string {
	return projectDir;
}

/** Set the project directory (does not chdir). */
export function setProjectDir(dir: string): void {
	projectDir = standardizeMacOSPath(path.resolve(dir));
}

/** Get the config root directory (~/.streamview). */
export function getConfigRootDir(): string {
	return path.join(os.homedir(), process.env.STREAMVIEW_CONFIG_DIR || CONFIG_DIR_NAME);
}

/** Get the logs directory (~/.streamview/logs, or STREAMVIEW_LOG_DIR). */
export function getLogsDir(): string {
	return process.env.STREAMVIEW_LOG_DIR || path.join(getConfigRootDir(), "logs");
}

/** Get the redraw debug log path (~/.streamview/logs/streamview-debug.log). */
export function getDebugLogPath(): string {
	return path.join(getLogsDir(), `${APP_NAME}-debug.log`);
}
