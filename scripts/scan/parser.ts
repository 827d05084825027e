import semver, { type SemVer } from "semver";
import type { Logger } from "../shared/types.js";

/** Trailing segment that looks like it was meant to be a version ("1.2", "v3", "2.0.0.1") */
const VERSION_LIKE = /^v?\d+(\.\d+)*$/;

export interface ParsedDirectoryName {
	logicalName: string;
	/** null when no trailing hyphen-delimited suffix is a valid semantic version */
	version: SemVer | null;
}

/**
 * Split a directory name like "my-ext-1.2.3-beta.1" into its logical name and version.
 * Suffixes are tried longest first ("ext-1.2.3-beta.1", then "1.2.3-beta.1", then "beta.1"),
 * so pre-release tags containing hyphens stay attached to the version.
 * With no valid suffix, the whole directory name is the logical name.
 */
export const parseDirectoryName = (directoryName: string, logger?: Logger): ParsedDirectoryName => {
	const parts = directoryName.split("-");

	for (let i = 1; i < parts.length; i++) {
		const logicalName = parts.slice(0, i).join("-");
		const candidate = parts.slice(i).join("-");
		const version = semver.parse(candidate);
		if (version && logicalName) {
			return { logicalName, version };
		}
		logger?.debug(`'${candidate}' is not a semantic version (${directoryName})`);
	}

	const last = parts.length > 1 ? parts[parts.length - 1] : undefined;
	if (last && VERSION_LIKE.test(last)) {
		logger?.warn(`Invalid version '${last}' in '${directoryName}'`);
	}

	return { logicalName: directoryName, version: null };
};

/** Version text as shown in reports: major.minor.patch[-pre][+build] */
export const formatVersion = (version: SemVer): string =>
	version.build.length > 0 ? `${version.version}+${version.build.join(".")}` : version.version;
