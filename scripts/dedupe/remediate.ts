import { mkdir } from "node:fs/promises";
import { join } from "node:path";
import { moveDir } from "../shared/move-dir.js";
import { getOldEntries } from "./duplicates.js";
import type {
	ConfirmFn,
	ExtensionGroup,
	FailedMove,
	LatestVersions,
	Logger,
	RemediationResult,
} from "../shared/types.js";

export const DECLINED_LINE = "No duplicates removed.";

export interface RemediateOptions {
	extensionsPath: string;
	quarantineDir: string;
	/** Skip the confirmation step entirely */
	autoApprove: boolean;
	confirm: ConfirmFn;
	logger: Logger;
}

/**
 * Move every non-latest versioned directory into the quarantine directory.
 *
 * idle → awaiting confirmation → executing → done. Without duplicates nothing
 * happens (no prompt, no directory). `autoApprove` goes straight to executing.
 * Each move is attempted once; a failure is logged and the next move proceeds.
 */
export const removeDuplicates = async (
	duplicates: ExtensionGroup,
	latestVersions: LatestVersions,
	options: RemediateOptions,
): Promise<RemediationResult> => {
	const { extensionsPath, quarantineDir, autoApprove, confirm, logger } = options;

	if (duplicates.size === 0) return { status: "skipped" };

	if (!autoApprove && !(await confirm())) {
		logger.message(DECLINED_LINE);
		return { status: "declined" };
	}

	await mkdir(quarantineDir, { recursive: true });

	const moved: string[] = [];
	const failed: FailedMove[] = [];

	for (const [name, entries] of duplicates) {
		const latest = latestVersions.get(name);
		if (!latest) continue;

		for (const entry of getOldEntries(entries, latest)) {
			const source = join(extensionsPath, entry.directoryName);
			const destination = join(quarantineDir, entry.directoryName);
			try {
				await moveDir(source, destination);
				moved.push(source);
				logger.success(`Moved '${source}' to '${destination}'`);
			} catch (err) {
				const reason = err instanceof Error ? err.message : String(err);
				failed.push({ source, destination, reason });
				logger.error(`Error moving '${source}' to '${destination}': ${reason}`);
			}
		}
	}

	return { status: "executed", moved, failed };
};
