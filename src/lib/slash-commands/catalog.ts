import { type ArtifactInfo, ArtifactStore } from "../artifacts/store.js";
import type { WorkingContext } from "../config.js";
import { NotFoundError } from "../errors.js";
import { filterByNamePattern } from "../name-pattern.js";
import { commandsDir, resolveRegistryRoot, resolveScopeRoot } from "../scopes.js";
import { type CommandDocument, readCommandDocument } from "./format.js";

export type CommandLocation = "user" | "project" | "registry";

export const COMMAND_LOCATIONS: readonly CommandLocation[] = ["user", "registry", "project"];

/** Lookup order for `show`: the most specific copy wins. */
const SHOW_PRIORITY: readonly CommandLocation[] = ["project", "user", "registry"];

const ABSENT: ArtifactInfo = { exists: false, hash: null, modifiedAt: null };

export type CommandCatalogEntry = {
	name: string;
	synced: boolean;
	locations: Record<CommandLocation, ArtifactInfo>;
};

export type ListCommandCatalogOptions = {
	locations?: CommandLocation[] | null;
	pattern?: string | null;
};

export type ShownCommand = CommandDocument & {
	name: string;
	location: CommandLocation;
	path: string;
	contents: string;
};

export function isCommandLocation(value: unknown): value is CommandLocation {
	return value === "user" || value === "project" || value === "registry";
}

export function resolveLocationStore(
	context: WorkingContext,
	location: CommandLocation,
): ArtifactStore {
	if (location === "registry") {
		return new ArtifactStore(commandsDir(resolveRegistryRoot(context)));
	}
	return new ArtifactStore(commandsDir(resolveScopeRoot(context, location).root));
}

function availableLocations(context: WorkingContext): CommandLocation[] {
	return COMMAND_LOCATIONS.filter((location) => {
		if (location === "registry") {
			return context.registryDir !== null;
		}
		if (location === "user") {
			return context.userDir !== null;
		}
		return true;
	});
}

function isSynced(infos: ArtifactInfo[]): boolean {
	const hashes = infos.flatMap((info) => (info.exists ? [info.hash] : []));
	if (hashes.length === 0) {
		return false;
	}
	return new Set(hashes).size === 1;
}

/**
 * Every command name found in the selected locations with per-location presence and
 * whether all present copies are byte-identical. Without explicit locations, locations
 * that are not configured are skipped rather than reported as errors.
 */
export async function listCommandCatalog(
	context: WorkingContext,
	options: ListCommandCatalogOptions = {},
): Promise<CommandCatalogEntry[]> {
	const requested =
		options.locations && options.locations.length > 0
			? COMMAND_LOCATIONS.filter((location) => options.locations?.includes(location))
			: availableLocations(context);
	const stores = new Map<CommandLocation, ArtifactStore>();
	for (const location of requested) {
		stores.set(location, resolveLocationStore(context, location));
	}

	const names = new Set<string>();
	for (const store of stores.values()) {
		for (const name of await store.list()) {
			names.add(name);
		}
	}

	const entries: CommandCatalogEntry[] = [];
	for (const name of filterByNamePattern([...names].sort(), options.pattern, (value) => value)) {
		const locations: Record<CommandLocation, ArtifactInfo> = {
			user: ABSENT,
			registry: ABSENT,
			project: ABSENT,
		};
		for (const [location, store] of stores) {
			locations[location] = await store.info(name);
		}
		entries.push({
			name,
			synced: isSynced([...stores.keys()].map((location) => locations[location])),
			locations,
		});
	}
	return entries;
}

export async function showCommand(context: WorkingContext, name: string): Promise<ShownCommand> {
	for (const location of SHOW_PRIORITY) {
		if (!availableLocations(context).includes(location)) {
			continue;
		}
		const store = resolveLocationStore(context, location);
		const content = await store.readOptional(name);
		if (!content) {
			continue;
		}
		const contents = content.toString("utf8");
		return {
			name,
			location,
			path: store.pathFor(name),
			contents,
			...readCommandDocument(contents),
		};
	}
	throw new NotFoundError(`Command "${name}" not found.`);
}
