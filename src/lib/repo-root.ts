import { stat } from "node:fs/promises";
import path from "node:path";

const REPO_MARKER = ".git";

async function pathExists(candidate: string): Promise<boolean> {
	try {
		await stat(candidate);
		return true;
	} catch {
		return false;
	}
}

/**
 * Walk upward from `startDir` and return the first directory holding a `.git` entry.
 * A `.git` file (worktrees, submodules) counts as well as a directory.
 */
export async function findRepoRoot(startDir: string): Promise<string | null> {
	let current = path.resolve(startDir);
	let previous = "";

	while (current !== previous) {
		if (await pathExists(path.join(current, REPO_MARKER))) {
			return current;
		}

		previous = current;
		current = path.dirname(current);
	}

	return null;
}
