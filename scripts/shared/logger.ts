import * as p from "@clack/prompts";
import color from "picocolors";
import type { Logger } from "./types.js";

const noop = (): void => {};

/** Interactive output through clack's log gutter */
export const createClackLogger = (verbose: boolean): Logger => ({
	message: (line) => p.log.message(line),
	success: (line) => p.log.success(line),
	warn: (line) => p.log.warn(color.yellow(line)),
	error: (line) => p.log.error(line),
	debug: verbose ? (line) => p.log.message(color.dim(line)) : noop,
});

/** Bare lines on stdout, diagnostics inline with the report, suitable for piping */
export const createPlainLogger = (verbose: boolean): Logger => ({
	message: (line) => console.log(line),
	success: (line) => console.log(line),
	warn: (line) => console.log(line),
	error: (line) => console.log(line),
	debug: verbose ? (line) => console.log(line) : noop,
});
