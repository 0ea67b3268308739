import { $pickenv, logger } from "@streamview/utils";
import { DEFAULT_UPDATE_INTERVAL_MS } from "./debounce";
import { DEFAULT_MIN_WRAP_WIDTH } from "./wrap-cache";

export interface ViewportConfig {
	/** Minimum milliseconds between real surface updates */
	updateIntervalMs: number;
	/** Wrap widths at or below this render raw text */
	minWrapWidth: number;
	/** Columns subtracted from the surface width to get the wrap width */
	horizontalPadding: number;
	/** Period of the flush tick driven by the loader */
	tickIntervalMs: number;
}

export const DEFAULT_VIEWPORT_CONFIG: Readonly<ViewportConfig> = {
	updateIntervalMs: DEFAULT_UPDATE_INTERVAL_MS,
	minWrapWidth: DEFAULT_MIN_WRAP_WIDTH,
	horizontalPadding: 4,
	tickIntervalMs: 80,
};

const CONFIG_KEYS = [
	"updateIntervalMs",
	"minWrapWidth",
	"horizontalPadding",
	"tickIntervalMs",
] as const satisfies readonly (keyof ViewportConfig)[];

const ENV_KEYS: Record<keyof ViewportConfig, string> = {
	updateIntervalMs: "STREAMVIEW_UPDATE_INTERVAL_MS",
	minWrapWidth: "STREAMVIEW_MIN_WRAP_WIDTH",
	horizontalPadding: "STREAMVIEW_WRAP_PADDING",
	tickIntervalMs: "STREAMVIEW_TICK_INTERVAL_MS",
};

// Intervals must be positive; widths and padding may be zero
const MIN_VALUE: Record<keyof ViewportConfig, number> = {
	updateIntervalMs: 1,
	minWrapWidth: 0,
	horizontalPadding: 0,
	tickIntervalMs: 1,
};

function isValid(key: keyof ViewportConfig, value: number): boolean {
	return Number.isInteger(value) && value >= MIN_VALUE[key];
}

function fromEnv(key: keyof ViewportConfig): number | undefined {
	const raw = $pickenv(ENV_KEYS[key]);
	if (raw === undefined) return undefined;
	const value = Number(raw);
	if (!isValid(key, value)) {
		logger.warn("Ignoring invalid viewport setting", { variable: ENV_KEYS[key], value: raw });
		return undefined;
	}
	return value;
}

/**
 * Resolve viewport settings: explicit overrides, then STREAMVIEW_* environment variables,
 * then defaults. Invalid values are skipped with a warning.
 */
export function resolveViewportConfig(overrides: Partial<ViewportConfig> = {}): ViewportConfig {
	const config: ViewportConfig = { ...DEFAULT_VIEWPORT_CONFIG };
	for (const key of CONFIG_KEYS) {
		const override = overrides[key];
		if (override !== undefined) {
			if (isValid(key, override)) {
				config[key] = override;
				continue;
			}
			logger.warn("Ignoring invalid viewport override", { key, value: override });
		}
		config[key] = fromEnv(key) ?? config[key];
	}
	return config;
}
