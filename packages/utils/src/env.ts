import * as fs from "node:fs";
import * as path from "node:path";
import { getConfigRootDir, getProjectDir } from "./dirs";

/**
 * Parses a .env file synchronously and extracts key-value string pairs.
 * Ignores lines that are empty or start with '#'. Trims whitespace.
 * Allows values to be quoted with single or double quotes.
 */
export function parseEnvFile(filePath: string): Record<string, string> {
	const result: Record<string, string> = {};
	let content: string;
	try {
		content = fs.readFileSync(filePath, "utf-8");
	} catch {
		// Missing or unreadable file contributes nothing
		return result;
	}

	for (const line of content.split("\n")) {
		const trimmed = line.trim();
		if (!trimmed || trimmed.startsWith("#")) continue;

		const eqIndex = trimmed.indexOf("=");
		if (eqIndex === -1) continue;

		const key = trimmed.slice(0, eqIndex).trim();
		let value = trimmed.slice(eqIndex + 1).trim();

		if ((value.startsWith('"') && value.endsWith('"')) || (value.startsWith("'") && value.endsWith("'"))) {
			value = value.slice(1, -1);
		}

		if (key) result[key] = value;
	}
	return result;
}

/**
 * Copy values from .env files into `target`, never overriding a value that is already set.
 * Earlier files win over later ones.
 */
export function applyEnvFiles(files: string[], target: NodeJS.ProcessEnv = process.env): void {
	for (const file of files) {
		for (const [key, value] of Object.entries(parseEnvFile(file))) {
			if (!target[key]) {
				target[key] = value;
			}
		}
	}
}

// Eagerly load the project's .env, then ~/.streamview/.env
applyEnvFiles([path.join(getProjectDir(), ".env"), path.join(getConfigRootDir(), ".env")]);

/**
 * Re-export of process.env.
 *
 * Import this module (import { $env } from "@streamview/utils") before reading
 * environment variables so that .env files have already been applied.
 */
export const $env: NodeJS.ProcessEnv = process.env;

/**
 * Resolve the first non-blank environment variable value from the given keys.
 */
export function $pickenv(...keys: string[]): string | undefined {
	for (const key of keys) {
		const value = $env[key]?.trim();
		if (value) {
			return value;
		}
	}
	return undefined;
}
