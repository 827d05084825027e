import semver, { type SemVer } from "semver";
import type { ExtensionGroup, LatestVersions, VersionedEntry } from "../shared/types.js";

/** Keep only names with more than one version. The input map is left untouched. */
export const findDuplicates = <T>(group: Map<string, T[]>): Map<string, T[]> => {
	const duplicates = new Map<string, T[]>();
	for (const [name, versions] of group) {
		if (versions.length > 1) duplicates.set(name, versions);
	}
	return duplicates;
};

/** Highest version per name. Equal versions resolve to the first one seen. */
export const getLatestVersions = (duplicates: ExtensionGroup): LatestVersions => {
	const latest: LatestVersions = new Map();
	for (const [name, entries] of duplicates) {
		let max = entries[0]?.version;
		for (const { version } of entries) {
			if (max && semver.gt(version, max)) max = version;
		}
		if (max) latest.set(name, max);
	}
	return latest;
};

/**
 * Entries that are not the latest version. Comparison follows semver precedence,
 * so build metadata is ignored and every directory equal to the latest stays put.
 */
export const getOldEntries = (entries: VersionedEntry[], latest: SemVer): VersionedEntry[] =>
	entries.filter((entry) => semver.compare(entry.version, latest) !== 0);
