import { z } from "zod";
import { UNVERSIONED_POLICIES } from "./types.js";

export const DEFAULT_QUARANTINE_DIR = "old_versions";

/** Validated command-line options */
export const dedupeOptionsSchema = z.object({
	extensionsPath: z
		.string({ required_error: "Missing path to the extensions directory" })
		.min(1, "Missing path to the extensions directory"),
	autoApprove: z.boolean().default(false),
	quarantineDir: z.string().min(1, "Quarantine directory must not be empty").default(DEFAULT_QUARANTINE_DIR),
	unversioned: z.enum(UNVERSIONED_POLICIES).default("retain"),
	plain: z.boolean().default(false),
	verbose: z.boolean().default(false),
});

export type DedupeOptions = z.infer<typeof dedupeOptionsSchema>;
