import { ArtifactStore } from "../artifacts/store.js";
import type { WorkingContext } from "../config.js";
import { NotFoundError } from "../errors.js";
import { commandsDir, resolveRegistryRoot, resolveWriteRoot, type Scope } from "../scopes.js";

export type ArtifactStatus = "private" | "available" | "published" | "dirty";

export const ARTIFACT_STATUSES: readonly ArtifactStatus[] = [
	"private",
	"available",
	"published",
	"dirty",
];

/**
 * The two locations an artifact moves between: the local copy (user or project scope)
 * and the shared registry repository.
 */
export type SyncPair = {
	localScope: Scope;
	local: ArtifactStore;
	repository: ArtifactStore;
};

export type PairContents = {
	local: Buffer | null;
	repository: Buffer | null;
};

export type ArtifactStatusEntry = {
	name: string;
	status: ArtifactStatus;
};

export function resolveCommandSyncPair(context: WorkingContext, scope?: Scope): SyncPair {
	const localRoot = resolveWriteRoot(context, scope);
	return {
		localScope: localRoot.scope,
		local: new ArtifactStore(commandsDir(localRoot.root)),
		repository: new ArtifactStore(commandsDir(resolveRegistryRoot(context))),
	};
}

export function classifyStatus(
	local: Uint8Array | null,
	repository: Uint8Array | null,
): ArtifactStatus | null {
	if (local && repository) {
		return Buffer.from(local).equals(repository) ? "published" : "dirty";
	}
	if (local) {
		return "private";
	}
	if (repository) {
		return "available";
	}
	return null;
}

export async function readPairContents(pair: SyncPair, name: string): Promise<PairContents> {
	return {
		local: await pair.local.readOptional(name),
		repository: await pair.repository.readOptional(name),
	};
}

export async function getArtifactStatus(pair: SyncPair, name: string): Promise<ArtifactStatus> {
	const { local, repository } = await readPairContents(pair, name);
	const status = classifyStatus(local, repository);
	if (!status) {
		throw new NotFoundError(
			`Command "${name}" not found in ${pair.localScope} scope or the registry.`,
		);
	}
	return status;
}

export async function listArtifactStatuses(pair: SyncPair): Promise<ArtifactStatusEntry[]> {
	const names = new Set([...(await pair.local.list()), ...(await pair.repository.list())]);
	const entries: ArtifactStatusEntry[] = [];
	for (const name of [...names].sort()) {
		const { local, repository } = await readPairContents(pair, name);
		const status = classifyStatus(local, repository);
		if (status) {
			entries.push({ name, status });
		}
	}
	return entries;
}
