import { readFile } from "node:fs/promises";
import path from "node:path";
import { z } from "zod";
import { errnoCode, InvalidArgumentError, InvalidNameError, IoError } from "../errors.js";
import type { LaunchSpec } from "./types.js";

export const SERVER_NAME_PATTERN = /^[A-Za-z0-9_-]+$/;
export const SELF_COMMAND = "agentcfg";
export const SELF_ARGS = ["serve"];

const MCP_SEGMENT = "mcp";

const packageManifestSchema = z.object({
	name: z.string().optional(),
	bin: z.union([z.string(), z.record(z.string())]).optional(),
});

export type LaunchSource = {
	command?: string | null;
	args?: string | string[] | null;
	url?: string | null;
	path?: string | null;
	self?: boolean;
};

export type BuiltLaunchSpec = {
	launch: LaunchSpec;
	suggestedName: string | null;
};

export function normalizeServerName(raw: string): string {
	const trimmed = raw.trim();
	if (!SERVER_NAME_PATTERN.test(trimmed)) {
		throw new InvalidNameError(
			`Invalid or empty server name "${raw}". Use letters, digits, "_", and "-".`,
		);
	}
	return trimmed;
}

/**
 * Drop `mcp` segments from a command name: `mcp-my-mcp-tool-mcp` becomes `my-tool`.
 * A command made only of `mcp` segments keeps its name.
 */
export function deriveServerName(command: string): string {
	const baseName = path.basename(command.trim()).replace(/\.(c|m)?js$/, "");
	const segments = baseName.split("-").filter((segment) => segment.length > 0);
	const kept = segments.filter((segment) => segment.toLowerCase() !== MCP_SEGMENT);
	return kept.length > 0 ? kept.join("-") : baseName;
}

export function splitArgs(args?: string | string[] | null): string[] {
	if (!args) {
		return [];
	}
	if (Array.isArray(args)) {
		return args.filter((arg) => arg.length > 0);
	}
	return args.split(/\s+/).filter((arg) => arg.length > 0);
}

function unscopedName(packageName: string): string {
	const slash = packageName.lastIndexOf("/");
	return slash >= 0 ? packageName.slice(slash + 1) : packageName;
}

function hasMcpSegment(binName: string): boolean {
	return binName
		.toLowerCase()
		.split(/[-_]/)
		.some((segment) => segment === MCP_SEGMENT);
}

/**
 * Find the server executable a local package exposes through its `bin` field. With
 * several bins, the one carrying an `mcp` segment wins.
 */
export async function resolvePackageCommand(packageDir: string): Promise<string> {
	const manifestPath = path.join(path.resolve(packageDir), "package.json");
	let contents: string;
	try {
		contents = await readFile(manifestPath, "utf8");
	} catch (error) {
		if (errnoCode(error) === "ENOENT") {
			throw new InvalidArgumentError(`No package.json found at ${manifestPath}.`);
		}
		throw new IoError(`Failed to read ${manifestPath}`, error);
	}

	let parsed: unknown;
	try {
		parsed = JSON.parse(contents);
	} catch (error) {
		throw new IoError(`package.json is not valid JSON: ${manifestPath}`, error);
	}
	const manifest = packageManifestSchema.safeParse(parsed);
	if (!manifest.success || manifest.data.bin === undefined) {
		throw new InvalidArgumentError(`package.json at ${manifestPath} declares no "bin" entries.`);
	}

	const { bin, name } = manifest.data;
	if (typeof bin === "string") {
		if (!name) {
			throw new InvalidArgumentError(
				`package.json at ${manifestPath} has a single "bin" but no "name" to run it by.`,
			);
		}
		return unscopedName(name);
	}

	const binNames = Object.keys(bin);
	if (binNames.length === 1) {
		return binNames[0];
	}
	const mcpBins = binNames.filter(hasMcpSegment);
	if (mcpBins.length === 1) {
		return mcpBins[0];
	}
	throw new InvalidArgumentError(
		`Could not pick an MCP server from the "bin" entries in ${manifestPath} ` +
			`(${binNames.join(", ") || "none"}). Pass --command instead.`,
	);
}

/** Validates the URL but keeps it as written, without URL normalization. */
function parseServerUrl(raw: string): string {
	const trimmed = raw.trim();
	let url: URL;
	try {
		url = new URL(trimmed);
	} catch {
		throw new InvalidArgumentError(`Invalid server URL "${raw}".`);
	}
	if (url.protocol !== "http:" && url.protocol !== "https:") {
		throw new InvalidArgumentError(`Server URL must use http or https: "${raw}".`);
	}
	return trimmed;
}

export async function buildLaunchSpec(source: LaunchSource): Promise<BuiltLaunchSpec> {
	const provided = [
		source.command ? "command" : null,
		source.url ? "url" : null,
		source.path ? "path" : null,
		source.self ? "self" : null,
	].filter((value): value is string => value !== null);
	if (provided.length !== 1) {
		throw new InvalidArgumentError(
			"Provide exactly one server source: --command, --url, --path, or --self.",
		);
	}

	const args = splitArgs(source.args);
	if (source.self) {
		return {
			launch: { transport: "stdio", command: SELF_COMMAND, args: [...SELF_ARGS, ...args] },
			suggestedName: SELF_COMMAND,
		};
	}
	if (source.url) {
		return { launch: { transport: "http", url: parseServerUrl(source.url) }, suggestedName: null };
	}

	const command = source.path
		? await resolvePackageCommand(source.path)
		: (source.command ?? "").trim();
	if (!command) {
		throw new InvalidArgumentError("Server command must not be empty.");
	}
	return {
		launch: { transport: "stdio", command, args },
		suggestedName: deriveServerName(command),
	};
}

export function resolveServerName(explicit: string | null | undefined, suggested: string | null): string {
	if (explicit !== undefined && explicit !== null) {
		return normalizeServerName(explicit);
	}
	if (!suggested) {
		throw new InvalidArgumentError("A --name is required when registering a server by URL.");
	}
	return normalizeServerName(suggested);
}
