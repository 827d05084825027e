import type { SemVer } from "semver";

/** What to do with a directory whose name carries no parseable version */
export const UNVERSIONED_POLICIES = ["retain", "skip"] as const;

export type UnversionedPolicy = (typeof UNVERSIONED_POLICIES)[number];

/** A subdirectory split into its logical name and version */
export interface VersionedEntry {
	/** Extension identifier, e.g. "ms-python.python" */
	logicalName: string;
	version: SemVer;
	/** Directory name as found on disk */
	directoryName: string;
}

/**
 * Logical name → entries, in directory listing order.
 * Names kept under the "retain" policy map to an empty list.
 */
export type ExtensionGroup = Map<string, VersionedEntry[]>;

/** Logical name → highest version among its entries */
export type LatestVersions = Map<string, SemVer>;

/** Output sink shared by every pipeline stage */
export interface Logger {
	message: (line: string) => void;
	success: (line: string) => void;
	warn: (line: string) => void;
	error: (line: string) => void;
	/** Parse diagnostics; only printed in verbose mode */
	debug: (line: string) => void;
}

/** Decides whether old versions get moved */
export type ConfirmFn = () => Promise<boolean>;

export interface FailedMove {
	source: string;
	destination: string;
	reason: string;
}

export type RemediationResult =
	| { status: "skipped" }
	| { status: "declined" }
	| { status: "executed"; moved: string[]; failed: FailedMove[] };
