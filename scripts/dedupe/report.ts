import { formatVersion } from "../scan/parser.js";
import { getOldEntries } from "./duplicates.js";
import type { ExtensionGroup, LatestVersions, Logger } from "../shared/types.js";

export const NO_DUPLICATES_LINE = "No duplicate extensions found.";
export const REPORT_HEADER = "Duplicate extensions Report:";

/** One line per duplicate name, after a header; a single line when there is nothing to report */
export const formatReport = (duplicates: ExtensionGroup, latestVersions: LatestVersions): string[] => {
	if (duplicates.size === 0) return [NO_DUPLICATES_LINE];

	const lines = [REPORT_HEADER];
	for (const [name, entries] of duplicates) {
		const latest = latestVersions.get(name);
		if (!latest) continue;

		const old = getOldEntries(entries, latest).map((e) => formatVersion(e.version));
		lines.push(
			old.length > 0
				? `* ${name} (Latest: ${formatVersion(latest)}, Old: ${old.join(", ")})`
				: `* ${name} (Latest version: ${formatVersion(latest)} - no older duplicates)`,
		);
	}
	return lines;
};

export const showReport = (duplicates: ExtensionGroup, latestVersions: LatestVersions, logger: Logger): void => {
	for (const line of formatReport(duplicates, latestVersions)) {
		logger.message(line);
	}
};
