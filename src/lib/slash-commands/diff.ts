import { createTwoFilesPatch, diffLines } from "diff";
import { NotComparableError } from "../errors.js";
import { readPairContents, type SyncPair } from "./status.js";

export type LineChangeKind = "added" | "removed" | "unchanged";

export type LineChange = {
	kind: LineChangeKind;
	line: string;
};

function splitChangeValue(value: string): string[] {
	if (!value) {
		return [];
	}
	const trimmed = value.endsWith("\n") ? value.slice(0, -1) : value;
	return trimmed.split("\n");
}

/** Line-level changes that turn `before` into `after`. */
export function computeLineChanges(before: string, after: string): LineChange[] {
	const changes: LineChange[] = [];
	for (const change of diffLines(before, after)) {
		const kind: LineChangeKind = change.added
			? "added"
			: change.removed
				? "removed"
				: "unchanged";
		for (const line of splitChangeValue(change.value)) {
			changes.push({ kind, line });
		}
	}
	return changes;
}

export type ArtifactDiff = {
	name: string;
	repository: string;
	local: string;
	changes: LineChange[];
};

/**
 * Compare the registry copy (before) with the local copy (after). Both copies must
 * exist; identical copies produce only `unchanged` lines.
 */
export async function diffArtifact(pair: SyncPair, name: string): Promise<ArtifactDiff> {
	const { local, repository } = await readPairContents(pair, name);
	if (!local || !repository) {
		const missing = local ? "the registry" : `${pair.localScope} scope`;
		throw new NotComparableError(
			`Command "${name}" cannot be diffed: it is missing from ${missing}. Both copies must exist.`,
		);
	}

	const repositoryText = repository.toString("utf8");
	const localText = local.toString("utf8");
	return {
		name,
		repository: repositoryText,
		local: localText,
		changes: computeLineChanges(repositoryText, localText),
	};
}

export function hasDifferences(changes: LineChange[]): boolean {
	return changes.some((change) => change.kind !== "unchanged");
}

export function formatUnifiedDiff(diff: ArtifactDiff, localLabel = "Local"): string {
	return createTwoFilesPatch(
		`Registry (${diff.name})`,
		`${localLabel} (${diff.name})`,
		diff.repository,
		diff.local,
	);
}
