import { describe, it, expect } from "vitest";
import semver from "semver";
import { findDuplicates, getLatestVersions, getOldEntries } from "../duplicates.js";
import { entry, groupOf } from "./helpers.js";

describe("findDuplicates", () => {
	it("returns an empty map when every name has one version", () => {
		expect(findDuplicates(groupOf({ ext1: ["1.0.0"], ext2: ["2.0.0"] })).size).toBe(0);
	});

	it("keeps only names with more than one version", () => {
		const group = groupOf({ ext1: ["1.0.0", "1.1.0"], ext2: ["2.0.0"], ext3: [] });
		const duplicates = findDuplicates(group);
		expect([...duplicates.keys()]).toEqual(["ext1"]);
		expect(duplicates.get("ext1")).toBe(group.get("ext1"));
		expect(group.size).toBe(3);
	});

	it("keeps several duplicate names", () => {
		const duplicates = findDuplicates(groupOf({ ext1: ["1.0.0", "1.1.0"], ext2: ["2.0.0", "2.1.0", "2.2.0"] }));
		expect([...duplicates.keys()]).toEqual(["ext1", "ext2"]);
	});
});

describe("getLatestVersions", () => {
	it("picks the highest version per name", () => {
		const latest = getLatestVersions(groupOf({ ext1: ["1.0.0", "1.1.0"], ext2: ["2.0.0", "2.2.0", "2.1.0"] }));
		expect(latest.get("ext1")?.version).toBe("1.1.0");
		expect(latest.get("ext2")?.version).toBe("2.2.0");
	});

	it("ranks a release above its pre-releases", () => {
		const latest = getLatestVersions(groupOf({ ext: ["1.0.0", "1.0.0-rc.1"] }));
		expect(latest.get("ext")?.version).toBe("1.0.0");
	});

	it("compares pre-release identifiers segment by segment", () => {
		const latest = getLatestVersions(groupOf({ ext: ["1.0.0-alpha.1", "1.0.0-beta", "1.0.0-alpha"] }));
		expect(latest.get("ext")?.version).toBe("1.0.0-beta");
	});

	it("compares numbers numerically", () => {
		const latest = getLatestVersions(groupOf({ ext: ["1.9.0", "1.10.0"] }));
		expect(latest.get("ext")?.version).toBe("1.10.0");
	});

	it("is greater than or equal to every version of its name", () => {
		const duplicates = groupOf({ a: ["0.1.0", "0.0.9", "0.1.0-rc.2"], b: ["3.0.0", "3.0.0"] });
		const latest = getLatestVersions(duplicates);
		for (const [name, entries] of duplicates) {
			const max = latest.get(name)!;
			for (const e of entries) {
				expect(semver.gte(max, e.version)).toBe(true);
			}
		}
	});

	it("returns an empty map for no duplicates", () => {
		expect(getLatestVersions(new Map()).size).toBe(0);
	});
});

describe("getOldEntries", () => {
	it("keeps every directory equal to the latest version", () => {
		const entries = [entry("foo", "1.0.0"), entry("foo", "1.1.0", "foo-v1.1.0"), entry("foo", "1.1.0")];
		const old = getOldEntries(entries, new semver.SemVer("1.1.0"));
		expect(old.map((e) => e.directoryName)).toEqual(["foo-1.0.0"]);
	});

	it("ignores build metadata when comparing", () => {
		const entries = [entry("foo", "1.0.0+a"), entry("foo", "1.0.0+b")];
		expect(getOldEntries(entries, new semver.SemVer("1.0.0+a"))).toEqual([]);
	});
});
