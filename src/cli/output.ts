import type { ArtifactInfo } from "../lib/artifacts/store.js";
import type { ScopeContextStatus, UnifyResult } from "../lib/context-files.js";
import { isAgentCfgError } from "../lib/errors.js";
import type { ServerHealthReport } from "../lib/mcp/health.js";
import type { LaunchSpec, McpServerEntry } from "../lib/mcp/types.js";
import type { CommandCatalogEntry, CommandLocation } from "../lib/slash-commands/catalog.js";
import type { SyncOutcome } from "../lib/slash-commands/operations.js";
import type { ArtifactStatusEntry } from "../lib/slash-commands/status.js";

export function printJson(value: unknown): void {
	console.log(JSON.stringify(value, null, 2));
}

/**
 * Print a typed failure and set the exit code. Anything else is a bug and goes to the
 * yargs failure handler untouched.
 */
export function reportError(error: unknown): void {
	if (!isAgentCfgError(error)) {
		throw error;
	}
	console.error(`Error: ${error.message}`);
	process.exit(error.exitCode);
}

export async function withErrorReporting(handler: () => Promise<void>): Promise<void> {
	try {
		await handler();
	} catch (error) {
		reportError(error);
	}
}

function padColumn(values: string[]): number {
	return values.reduce((width, value) => Math.max(width, value.length), 0);
}

function locationMark(location: CommandLocation, info: ArtifactInfo): string {
	return info.exists ? location : "-".padEnd(location.length);
}

export function formatCatalog(
	entries: CommandCatalogEntry[],
	locations: readonly CommandLocation[],
): string {
	if (entries.length === 0) {
		return "No commands found.";
	}
	const width = padColumn(entries.map((entry) => entry.name));
	return entries
		.map((entry) => {
			const marks = locations.map((location) => locationMark(location, entry.locations[location]));
			const state = entry.synced ? "synced" : "differs";
			return `${entry.name.padEnd(width)}  ${marks.join(" ")}  ${state}`;
		})
		.join("\n");
}

export function formatStatuses(entries: ArtifactStatusEntry[]): string {
	if (entries.length === 0) {
		return "No commands found.";
	}
	return entries.map((entry) => `${entry.status.padEnd(9)} ${entry.name}`).join("\n");
}

export type SyncVerb = "add" | "publish" | "install";

const APPLIED_MESSAGES: Record<SyncVerb, (outcome: SyncOutcome) => string> = {
	add: (outcome) => `Created command "${outcome.name}" at ${outcome.path} (${outcome.artifactStatus}).`,
	publish: (outcome) => `Published "${outcome.name}" to ${outcome.path}.`,
	install: (outcome) => `Installed "${outcome.name}" to ${outcome.path}.`,
};

export function formatSyncOutcome(verb: SyncVerb, outcome: SyncOutcome): string {
	if (outcome.status === "unchanged") {
		return `Command "${outcome.name}" is already up to date at ${outcome.path}.`;
	}
	return APPLIED_MESSAGES[verb](outcome);
}

export function describeLaunch(launch: LaunchSpec): string {
	if (launch.transport === "http") {
		return launch.url;
	}
	return [launch.command, ...launch.args].join(" ");
}

export function formatServers(entries: McpServerEntry[]): string {
	if (entries.length === 0) {
		return "No MCP servers registered.";
	}
	const width = padColumn(entries.map((entry) => entry.name));
	return entries
		.map((entry) => `${entry.name.padEnd(width)}  [${entry.scope}]  ${describeLaunch(entry.launch)}`)
		.join("\n");
}

export function formatHealthReport(report: ServerHealthReport): string {
	const label = `${report.entry.name} [${report.entry.scope}]`;
	const { result } = report;
	if (result.healthy) {
		return `${label}: healthy (version ${result.version})`;
	}
	return `${label}: unhealthy (${result.error}) ${result.message}`;
}

export function formatContextStatus(statuses: ScopeContextStatus[]): string {
	const lines: string[] = [];
	for (const status of statuses) {
		lines.push(`${status.scope} scope: ${status.state}`);
		for (const [name, file] of Object.entries(status.files)) {
			const target = file.symlinkTarget ? ` -> ${file.symlinkTarget}` : "";
			lines.push(`  ${name.padEnd(10)} ${file.state.padEnd(15)} ${file.path}${target}`);
		}
	}
	return lines.join("\n");
}

export function formatUnifyResult(result: UnifyResult): string {
	if (result.status === "unchanged") {
		return `Already unified (${result.scope} scope): ${result.unifiedPath}`;
	}
	const lines = [`Unified ${result.sources.join(" and ")} into ${result.unifiedPath}.`];
	for (const backup of result.backups) {
		lines.push(`Backed up: ${backup}`);
	}
	for (const link of result.symlinks) {
		lines.push(`Linked: ${link}`);
	}
	if (result.sources.length > 1) {
		lines.push("Review the merged file and remove duplicated sections.");
	}
	return lines.join("\n");
}
