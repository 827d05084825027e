import * as p from "@clack/prompts";

/** "yes" in any case, surrounding whitespace ignored */
export const isAffirmative = (answer: string): boolean => answer.trim().toLowerCase() === "yes";

/** Ask before moving old versions. Cancelling the prompt counts as "no". */
export const askRemoveDuplicates = async (): Promise<boolean> => {
	const answer = await p.text({
		message: "Remove old duplicates? (yes/no)",
		placeholder: "no",
	});

	if (p.isCancel(answer)) {
		p.cancel("Operation cancelled.");
		return false;
	}

	return isAffirmative(answer);
};

/** Fatal error text: the message, or the full stack trace in verbose mode */
export const formatFatalError = (err: unknown, verbose: boolean): string => {
	if (!(err instanceof Error)) return String(err);
	return verbose && err.stack ? err.stack : err.message;
};
