import type { ChalkInstance } from "chalk";

export type StyleFn = (text: string) => string;

export interface ViewportSymbols {
	spinnerFrames: string[];
}

/**
 * Styling for the viewport and its loader.
 *
 * Passed by reference at construction. Nothing here is module state, so two viewports
 * can render with different themes and a theme switch is just a new object.
 */
export interface ViewportTheme {
	/** Shown before the viewport has a size */
	placeholder: StyleFn;
	spinner: StyleFn;
	message: StyleFn;
	symbols: ViewportSymbols;
}

export const DEFAULT_SPINNER_FRAMES = ["⠋", "⠙", "⠹", "⠸", "⠼", "⠴", "⠦", "⠧", "⠇", "⠏"];

export function createTheme(chalk: ChalkInstance, symbols: Partial<ViewportSymbols> = {}): ViewportTheme {
	return {
		placeholder: text => chalk.dim(text),
		spinner: text => chalk.cyan(text),
		message: text => chalk.dim(text),
		symbols: {
			spinnerFrames: symbols.spinnerFrames ?? DEFAULT_SPINNER_FRAMES,
		},
	};
}
