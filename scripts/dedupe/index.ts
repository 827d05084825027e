import { resolve } from "node:path";
import { scanExtensions } from "../scan/index.js";
import { findDuplicates, getLatestVersions } from "./duplicates.js";
import { showReport } from "./report.js";
import { removeDuplicates } from "./remediate.js";
import type { DedupeOptions } from "../shared/schemas.js";
import type { ConfirmFn, Logger, RemediationResult } from "../shared/types.js";

export interface DedupeDeps {
	logger: Logger;
	confirm: ConfirmFn;
	/** Base for relative paths (default: process.cwd()) */
	cwd?: string;
}

/** Scan, report, then (after confirmation) quarantine old versions */
export const runDedupe = async (options: DedupeOptions, deps: DedupeDeps): Promise<RemediationResult> => {
	const { logger, confirm } = deps;
	const cwd = deps.cwd ?? process.cwd();
	const extensionsPath = resolve(cwd, options.extensionsPath);
	const quarantineDir = resolve(cwd, options.quarantineDir);

	const group = await scanExtensions(extensionsPath, {
		unversioned: options.unversioned,
		logger,
		exclude: [quarantineDir],
	});
	const duplicates = findDuplicates(group);
	const latestVersions = getLatestVersions(duplicates);

	showReport(duplicates, latestVersions, logger);

	return removeDuplicates(duplicates, latestVersions, {
		extensionsPath,
		quarantineDir,
		autoApprove: options.autoApprove,
		confirm,
		logger,
	});
};
