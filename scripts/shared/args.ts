import { dedupeOptionsSchema, type DedupeOptions } from "./schemas.js";

export const QUARANTINE_ENV_VAR = "EXTENSION_DEDUPE_QUARANTINE_DIR";

export interface ParsedArgs {
	extensionsPath?: string;
	autoApprove: boolean;
	quarantineDir?: string;
	skipUnversioned: boolean;
	plain: boolean;
	verbose: boolean;
}

export const parseArgs = (argv: string[]): ParsedArgs => {
	let quarantineDir: string | undefined;
	let autoApprove = false;
	let skipUnversioned = false;
	let plain = false;
	let verbose = false;
	const positional: string[] = [];
	for (let i = 2; i < argv.length; i++) {
		const arg = argv[i]!;
		if (arg === "--yes" || arg === "-y" || arg === "--auto-approve") {
			autoApprove = true;
		} else if (arg === "--quarantine" || arg === "-q") {
			// A missing value stays "" so validation rejects it instead of falling back to the default
			const value = argv[i + 1];
			if (value === undefined || value.startsWith("-")) {
				quarantineDir = "";
			} else {
				quarantineDir = value;
				i++;
			}
		} else if (arg === "--skip-unversioned") {
			skipUnversioned = true;
		} else if (arg === "--plain") {
			plain = true;
		} else if (arg === "--verbose") {
			verbose = true;
		} else if (!arg.startsWith("-")) {
			positional.push(arg);
		}
	}
	return {
		extensionsPath: positional[0],
		autoApprove,
		quarantineDir,
		skipUnversioned,
		plain,
		verbose,
	};
};

/** Merge parsed flags with the environment and validate. Throws a message naming the first issue. */
export const resolveOptions = (args: ParsedArgs, env: NodeJS.ProcessEnv = process.env): DedupeOptions => {
	const result = dedupeOptionsSchema.safeParse({
		extensionsPath: args.extensionsPath,
		autoApprove: args.autoApprove,
		quarantineDir: args.quarantineDir ?? env[QUARANTINE_ENV_VAR],
		unversioned: args.skipUnversioned ? "skip" : "retain",
		plain: args.plain,
		verbose: args.verbose,
	});
	if (!result.success) {
		throw new Error(result.error.issues[0]?.message ?? "Invalid arguments");
	}
	return result.data;
};
