import type { WorkingContext } from "../config.js";
import { NameCollisionError, NotFoundError } from "../errors.js";
import { filterByNamePattern } from "../name-pattern.js";
import {
	resolveScopeRoots,
	resolveWriteRoot,
	type Scope,
	type ScopeRoot,
	settingsPath,
} from "../scopes.js";
import { normalizeServerName } from "./launch-spec.js";
import { parseLaunchSpec, readSettings, toServerConfig, writeSettings } from "./settings-file.js";
import type { LaunchSpec, McpServerEntry } from "./types.js";

export type RegisterServerInput = {
	name: string;
	launch: LaunchSpec;
};

export type RegisterServerOptions = {
	scope?: Scope;
	overwrite?: boolean;
};

export type RegisterServerResult = {
	entry: McpServerEntry;
	path: string;
	replaced: boolean;
};

export type ListServersOptions = {
	scope?: Scope;
	pattern?: string | null;
};

export type RemoveServerResult = {
	entry: McpServerEntry;
	path: string;
};

async function readScopeEntries(root: ScopeRoot): Promise<McpServerEntry[]> {
	const filePath = settingsPath(root.root);
	const settings = await readSettings(filePath);
	const servers = settings.mcpServers ?? {};
	return Object.keys(servers)
		.sort()
		.map((name) => ({
			name,
			scope: root.scope,
			launch: parseLaunchSpec(name, servers[name], filePath),
		}));
}

/**
 * Add a server to one scope's settings. A name already taken in that scope is rejected
 * unless `overwrite` is set, in which case the old entry is replaced where it stood.
 */
export async function registerServer(
	context: WorkingContext,
	input: RegisterServerInput,
	options: RegisterServerOptions = {},
): Promise<RegisterServerResult> {
	const name = normalizeServerName(input.name);
	const root = resolveWriteRoot(context, options.scope);
	const filePath = settingsPath(root.root);
	const settings = await readSettings(filePath);
	const servers = { ...(settings.mcpServers ?? {}) };

	const replaced = Object.hasOwn(servers, name);
	if (replaced && !options.overwrite) {
		throw new NameCollisionError(
			`MCP server "${name}" is already registered in ${root.scope} scope (${filePath}). ` +
				"Pass --overwrite to replace it or choose another --name.",
		);
	}

	servers[name] = toServerConfig(input.launch);
	await writeSettings(filePath, { ...settings, mcpServers: servers });
	return {
		entry: { name, scope: root.scope, launch: input.launch },
		path: filePath,
		replaced,
	};
}

/** Entries in scope order (project, then user), name order within a scope. */
export async function listServers(
	context: WorkingContext,
	options: ListServersOptions = {},
): Promise<McpServerEntry[]> {
	const entries: McpServerEntry[] = [];
	for (const root of resolveScopeRoots(context, options.scope, "read")) {
		entries.push(...(await readScopeEntries(root)));
	}
	return filterByNamePattern(entries, options.pattern, (entry) => entry.name);
}

export async function findServer(
	context: WorkingContext,
	name: string,
	options: { scope?: Scope } = {},
): Promise<McpServerEntry> {
	const [entry] = (await listServers(context, { scope: options.scope })).filter(
		(candidate) => candidate.name === name,
	);
	if (!entry) {
		const where = options.scope ? `${options.scope} scope` : "any scope";
		throw new NotFoundError(`MCP server "${name}" not found in ${where}.`);
	}
	return entry;
}

export async function removeServer(
	context: WorkingContext,
	name: string,
	options: { scope?: Scope } = {},
): Promise<RemoveServerResult> {
	const root = resolveWriteRoot(context, options.scope);
	const filePath = settingsPath(root.root);
	const settings = await readSettings(filePath);
	const servers = { ...(settings.mcpServers ?? {}) };

	if (!Object.hasOwn(servers, name)) {
		throw new NotFoundError(`MCP server "${name}" not found in ${root.scope} scope (${filePath}).`);
	}

	const entry: McpServerEntry = {
		name,
		scope: root.scope,
		launch: parseLaunchSpec(name, servers[name], filePath),
	};
	delete servers[name];
	await writeSettings(filePath, { ...settings, mcpServers: servers });
	return { entry, path: filePath };
}
