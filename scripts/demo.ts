#!/usr/bin/env node
/**
 * Stream a file (or generated text) into a full-screen viewport.
 *
 * Usage:
 *   tsx scripts/demo.ts [file] [--chunk 6] [--delay 8]
 *
 * Up/Down/PageUp/PageDown/Home/End scroll; scrolling up pauses follow mode, End resumes it.
 * q or Ctrl+C quits.
 */
import * as fs from "node:fs/promises";
import { parseArgs } from "node:util";
import {
	createTheme,
	emergencyTerminalRestore,
	Loader,
	ProcessTerminal,
	pumpStream,
	StreamViewport,
	TUI,
} from "@streamview/tui";
import { logger } from "@streamview/utils";
import chalk from "chalk";

const SAMPLE_WORDS = [
	"stream",
	"viewport",
	"token",
	"wrap",
	"frame",
	"buffer",
	"scroll",
	"terminal",
	"width",
	"append",
	"render",
	"cache",
];

function sleep(ms: number, signal: AbortSignal): Promise<void> {
	return new Promise(resolve => {
		const timer = setTimeout(resolve, ms);
		signal.addEventListener(
			"abort",
			() => {
				clearTimeout(timer);
				resolve();
			},
			{ once: true },
		);
	});
}

async function* chunked(text: string, size: number, delayMs: number, signal: AbortSignal): AsyncGenerator<string> {
	for (let i = 0; i < text.length && !signal.aborted; i += size) {
		yield text.slice(i, i + size);
		await sleep(delayMs, signal);
	}
}

/** Pseudo-random prose so the demo runs without an input file. */
function generateText(paragraphs: number): string {
	let seed = 7;
	const next = () => {
		seed = (seed * 1103515245 + 12345) % 2147483648;
		return seed;
	};
	const out: string[] = [];
	for (let p = 0; p < paragraphs; p++) {
		const words: string[] = [];
		const count = 30 + (next() % 60);
		for (let w = 0; w < count; w++) {
			words.push(SAMPLE_WORDS[next() % SAMPLE_WORDS.length] ?? "");
		}
		out.push(`${chalk.bold(`Paragraph ${p + 1}.`)} ${words.join(" ")}.`);
	}
	return `${out.join("\n\n")}\n`;
}

async function main(): Promise<void> {
	const { values, positionals } = parseArgs({
		options: {
			chunk: { type: "string", short: "c", default: "6" },
			delay: { type: "string", short: "d", default: "8" },
			help: { type: "boolean", short: "h", default: false },
		},
		allowPositionals: true,
	});

	if (values.help) {
		console.log(`
streamview demo - stream text into a wrapped, scrolling viewport

Usage:
  tsx scripts/demo.ts [file] [options]

Options:
  -c, --chunk <chars>  Characters per streamed chunk (default: 6)
  -d, --delay <ms>     Delay between chunks (default: 8)
  -h, --help           Show this help message
`);
		return;
	}

	const chunkSize = Math.max(1, Number.parseInt(values.chunk, 10) || 6);
	const delayMs = Math.max(0, Number.parseInt(values.delay, 10) || 0);
	const file = positionals[0];
	const text = file ? await fs.readFile(file, "utf8") : generateText(40);

	const theme = createTheme(chalk);
	const terminal = new ProcessTerminal();
	const tui = new TUI(terminal);
	const viewport = new StreamViewport(theme, { ui: tui });
	const loader = new Loader(tui, theme, "Streaming...", viewport.config.tickIntervalMs);
	loader.onTick = () => viewport.flushIfDirty();

	tui.addChild(viewport);
	tui.addChild(loader);
	tui.setFocus(viewport);
	tui.onResize = (width, height) => viewport.setSize(width, height - 1);

	const controller = new AbortController();
	let requestQuit: () => void = () => {};
	const quit = new Promise<void>(resolve => {
		requestQuit = resolve;
	});

	tui.addInputListener(data => {
		if (data === "q" || data === "\x03") {
			controller.abort();
			requestQuit();
			return { consume: true };
		}
		return undefined;
	});

	tui.start();
	try {
		const result = await pumpStream(chunked(text, chunkSize, delayMs, controller.signal), viewport, {
			signal: controller.signal,
		});
		loader.stop();
		loader.setMessage(
			result.aborted
				? `Stopped after ${result.characters} characters`
				: `Done: ${result.chunks} chunks, ${result.characters} characters (q to quit)`,
		);
		logger.debug("demo stream finished", { ...result, stats: viewport.stats });
		await quit;
	} finally {
		loader.stop();
		tui.stop();
	}
}

process.on("uncaughtException", err => {
	emergencyTerminalRestore();
	logger.error("demo crashed", { error: String(err) });
	console.error(err);
	process.exit(1);
});

main().then(
	() => process.exit(0),
	err => {
		emergencyTerminalRestore();
		console.error(err);
		process.exit(1);
	},
);
