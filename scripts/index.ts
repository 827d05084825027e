#!/usr/bin/env node
import * as p from "@clack/prompts";
import { parseArgs, resolveOptions, type ParsedArgs } from "./shared/args.js";
import { askRemoveDuplicates, formatFatalError } from "./shared/cli.js";
import { createClackLogger, createPlainLogger } from "./shared/logger.js";
import { runDedupe } from "./dedupe/index.js";

const VERSION = "0.1.0";

const main = async (args: ParsedArgs): Promise<void> => {
	const options = resolveOptions(args);
	const logger = options.plain ? createPlainLogger(options.verbose) : createClackLogger(options.verbose);

	if (!options.plain) p.intro(`extension-dedupe v${VERSION}`);

	await runDedupe(options, { logger, confirm: askRemoveDuplicates });

	if (!options.plain) p.outro("Done!");
};

const args = parseArgs(process.argv);

main(args).catch((err) => {
	p.log.error(formatFatalError(err, args.verbose));
	process.exit(1);
});
