/**
 * Themes for TUI tests using chalk
 */
import { createTheme, type ViewportTheme } from "@streamview/tui";
import { Chalk } from "chalk";

export const SPINNER_FRAMES = ["-", "\\", "|", "/"];

/** No color at all: rendered lines equal the raw text. */
export const plainTheme: ViewportTheme = createTheme(new Chalk({ level: 0 }), { spinnerFrames: SPINNER_FRAMES });

/** Truecolor styling, for asserting that escapes survive wrapping and clamping. */
export const colorTheme: ViewportTheme = createTheme(new Chalk({ level: 3 }), { spinnerFrames: SPINNER_FRAMES });
