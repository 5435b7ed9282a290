import { assertArtifactName, type ArtifactStore } from "../artifacts/store.js";
import {
	type AgentCfgError,
	ConflictError,
	isAgentCfgError,
	NotFoundError,
} from "../errors.js";
import { type ArtifactStatus, classifyStatus, type SyncPair } from "./status.js";

export type SyncOutcome = {
	status: "applied" | "unchanged";
	name: string;
	path: string;
	artifactStatus: ArtifactStatus;
};

export type FailedOutcome = {
	status: "failed";
	name: string;
	error: AgentCfgError;
};

export type SyncResult = SyncOutcome | FailedOutcome;

export type AddOptions = {
	overwrite?: boolean;
};

export type TransferOptions = {
	force?: boolean;
};

function toBuffer(content: string | Uint8Array): Buffer {
	return typeof content === "string" ? Buffer.from(content, "utf8") : Buffer.from(content);
}

function requireStatus(local: Uint8Array | null, repository: Uint8Array | null): ArtifactStatus {
	const status = classifyStatus(local, repository);
	if (!status) {
		throw new Error("Artifact status requested for an artifact with no copies.");
	}
	return status;
}

/**
 * Turn typed failures into a `failed` result so callers get success, no-op, or failure
 * as data. Anything that is not an AgentCfgError is a bug and keeps propagating.
 */
export async function runOperation(
	name: string,
	operation: () => Promise<SyncOutcome>,
): Promise<SyncResult> {
	try {
		return await operation();
	} catch (error) {
		if (isAgentCfgError(error)) {
			return { status: "failed", name, error };
		}
		throw error;
	}
}

export async function addArtifact(
	pair: SyncPair,
	name: string,
	content: string | Uint8Array,
	options: AddOptions = {},
): Promise<SyncOutcome> {
	assertArtifactName(name);
	const next = toBuffer(content);
	const existing = await pair.local.readOptional(name);
	const repository = await pair.repository.readOptional(name);

	if (existing?.equals(next)) {
		return {
			status: "unchanged",
			name,
			path: pair.local.pathFor(name),
			artifactStatus: requireStatus(existing, repository),
		};
	}
	if (existing && !options.overwrite) {
		throw new ConflictError(
			`Command "${name}" already exists in ${pair.localScope} scope with different content. ` +
				"Pass --overwrite to replace it.",
		);
	}

	const filePath = await pair.local.write(name, next);
	return {
		status: "applied",
		name,
		path: filePath,
		artifactStatus: requireStatus(next, repository),
	};
}

async function transfer(options: {
	name: string;
	source: ArtifactStore;
	destination: ArtifactStore;
	sourceLabel: string;
	destinationLabel: string;
	force: boolean;
}): Promise<SyncOutcome> {
	const { name, source, destination } = options;
	const content = await source.readOptional(name);
	if (!content) {
		throw new NotFoundError(`Command "${name}" not found in ${options.sourceLabel}.`);
	}

	const current = await destination.readOptional(name);
	if (current?.equals(content)) {
		return { status: "unchanged", name, path: destination.pathFor(name), artifactStatus: "published" };
	}
	if (current && !options.force) {
		throw new ConflictError(
			`Command "${name}" differs between ${options.sourceLabel} and ${options.destinationLabel}. ` +
				`Pass --force to overwrite the copy in ${options.destinationLabel}.`,
		);
	}

	const filePath = await destination.write(name, content);
	return { status: "applied", name, path: filePath, artifactStatus: "published" };
}

/** Copy the local command into the registry. */
export async function publishArtifact(
	pair: SyncPair,
	name: string,
	options: TransferOptions = {},
): Promise<SyncOutcome> {
	return await transfer({
		name,
		source: pair.local,
		destination: pair.repository,
		sourceLabel: `${pair.localScope} scope`,
		destinationLabel: "the registry",
		force: options.force ?? false,
	});
}

/** Copy the registry command into the local scope. */
export async function installArtifact(
	pair: SyncPair,
	name: string,
	options: TransferOptions = {},
): Promise<SyncOutcome> {
	return await transfer({
		name,
		source: pair.repository,
		destination: pair.local,
		sourceLabel: "the registry",
		destinationLabel: `${pair.localScope} scope`,
		force: options.force ?? false,
	});
}

export async function removeArtifact(store: ArtifactStore, name: string): Promise<string> {
	return await store.remove(name);
}

export type SerializedSyncResult =
	| SyncOutcome
	| { status: "failed"; name: string; error: { code: string; message: string } };

/** Plain-data form of a result for JSON output. */
export function serializeResult(result: SyncResult): SerializedSyncResult {
	if (result.status !== "failed") {
		return result;
	}
	return {
		status: "failed",
		name: result.name,
		error: { code: result.error.code, message: result.error.message },
	};
}
