import { access, cp, rename, rm } from "node:fs/promises";

const pathExists = async (path: string): Promise<boolean> => {
	try {
		await access(path);
		return true;
	} catch {
		return false;
	}
};

const isCrossDevice = (err: unknown): boolean => err instanceof Error && "code" in err && err.code === "EXDEV";

/** Copy src to dest keeping file modes and symlinks as they are. A partial copy is removed on failure. */
const copyTree = async (src: string, dest: string): Promise<void> => {
	try {
		await cp(src, dest, { recursive: true, errorOnExist: true, force: false, verbatimSymlinks: true });
	} catch (err) {
		await rm(dest, { recursive: true, force: true });
		throw err;
	}
};

/**
 * Move a directory to `dest`. Refuses to overwrite an existing destination.
 * Renames when possible; across filesystems, copies and then removes the source.
 */
export const moveDir = async (src: string, dest: string): Promise<void> => {
	if (await pathExists(dest)) {
		throw new Error("destination already exists");
	}
	try {
		await rename(src, dest);
	} catch (err) {
		if (!isCrossDevice(err)) throw err;
		await copyTree(src, dest);
		await rm(src, { recursive: true, force: true });
	}
};
