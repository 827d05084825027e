import { readdir, stat } from "node:fs/promises";
import { join, resolve } from "node:path";
import type { Dirent } from "node:fs";
import { parseDirectoryName } from "./parser.js";
import type { ExtensionGroup, Logger, UnversionedPolicy } from "../shared/types.js";

export interface GroupOptions {
	unversioned: UnversionedPolicy;
	logger?: Logger;
}

export interface ScanOptions extends GroupOptions {
	/** Absolute paths to leave out of the scan (e.g. a quarantine directory inside the root) */
	exclude?: string[];
}

/** Dirent check that follows symlinks, so linked extension folders count as directories */
const isDirectoryEntry = async (dir: string, entry: Dirent): Promise<boolean> => {
	if (entry.isDirectory()) return true;
	if (!entry.isSymbolicLink()) return false;
	return stat(join(dir, entry.name)).then(
		(s) => s.isDirectory(),
		() => false,
	);
};

/**
 * List immediate subdirectory names of `root`, in listing order.
 * Skips dot-directories. Throws when `root` is missing or not a directory.
 */
export const listSubdirectories = async (root: string, exclude: string[] = []): Promise<string[]> => {
	const entries = await readdir(root, { withFileTypes: true });
	const excluded = new Set(exclude.map((p) => resolve(p)));
	const names: string[] = [];

	for (const entry of entries) {
		if (entry.name.startsWith(".")) continue;
		if (excluded.has(resolve(root, entry.name))) continue;
		if (await isDirectoryEntry(root, entry)) {
			names.push(entry.name);
		}
	}

	return names;
};

/** Group directory names by logical name. Versions keep the order of `directoryNames`. */
export const groupByName = (directoryNames: string[], options: GroupOptions): ExtensionGroup => {
	const { unversioned, logger } = options;
	const group: ExtensionGroup = new Map();

	for (const directoryName of directoryNames) {
		const { logicalName, version } = parseDirectoryName(directoryName, logger);

		if (!version) {
			if (unversioned === "retain" && !group.has(logicalName)) {
				group.set(logicalName, []);
			}
			continue;
		}

		const entries = group.get(logicalName) ?? [];
		entries.push({ logicalName, version, directoryName });
		group.set(logicalName, entries);
	}

	return group;
};

/** Scan `root` and group its versioned subdirectories by logical name */
export const scanExtensions = async (root: string, options: ScanOptions): Promise<ExtensionGroup> => {
	const names = await listSubdirectories(root, options.exclude);
	return groupByName(names, options);
};
