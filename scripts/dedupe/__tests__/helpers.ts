import semver from "semver";
import type { ExtensionGroup, VersionedEntry } from "../../shared/types.js";

export const entry = (logicalName: string, version: string, directoryName = `${logicalName}-${version}`): VersionedEntry => ({
	logicalName,
	version: new semver.SemVer(version),
	directoryName,
});

/** Build a group from `name → version strings` */
export const groupOf = (spec: Record<string, string[]>): ExtensionGroup =>
	new Map(
		Object.entries(spec).map(([name, versions]): [string, VersionedEntry[]] => [
			name,
			versions.map((v) => entry(name, v)),
		]),
	);
