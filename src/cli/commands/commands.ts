import { readFile } from "node:fs/promises";
import path from "node:path";
import type { CommandModule } from "yargs";
import { loadWorkingContext } from "../../lib/config.js";
import { IoError } from "../../lib/errors.js";
import { defaultWriteScope } from "../../lib/scopes.js";
import {
	COMMAND_LOCATIONS,
	listCommandCatalog,
	resolveLocationStore,
	showCommand,
} from "../../lib/slash-commands/catalog.js";
import { diffArtifact, formatUnifiedDiff, hasDifferences } from "../../lib/slash-commands/diff.js";
import { buildCommandDocument } from "../../lib/slash-commands/format.js";
import {
	addArtifact,
	installArtifact,
	publishArtifact,
	removeArtifact,
	runOperation,
	type SyncOutcome,
	serializeResult,
} from "../../lib/slash-commands/operations.js";
import {
	getArtifactStatus,
	listArtifactStatuses,
	resolveCommandSyncPair,
	type SyncPair,
} from "../../lib/slash-commands/status.js";
import {
	parseLocationList,
	parseLocationOption,
	parseScopeOption,
	scopeOption,
} from "../arguments.js";
import {
	formatCatalog,
	formatStatuses,
	formatSyncOutcome,
	printJson,
	reportError,
	type SyncVerb,
	withErrorReporting,
} from "../output.js";

type ListArgs = {
	location?: string | string[];
	filter?: string;
	json?: boolean;
};

type StatusArgs = {
	name?: string;
	scope?: string;
	json?: boolean;
};

type AddArgs = {
	name?: string;
	prompt?: string;
	desc?: string;
	file?: string;
	scope?: string;
	overwrite?: boolean;
	json?: boolean;
};

type NameArgs = {
	name?: string;
	scope?: string;
};

type TransferArgs = NameArgs & {
	force?: boolean;
	json?: boolean;
};

async function readContentFile(cwd: string, filePath: string): Promise<Buffer> {
	const resolved = path.resolve(cwd, filePath);
	try {
		return await readFile(resolved);
	} catch (error) {
		throw new IoError(`Failed to read ${resolved}`, error);
	}
}

/** Print a sync result; a failed result exits with the error's code. */
async function runSync(
	verb: SyncVerb,
	name: string,
	json: boolean,
	operation: () => Promise<SyncOutcome>,
): Promise<void> {
	const result = await runOperation(name, operation);
	if (json) {
		printJson(serializeResult(result));
		if (result.status === "failed") {
			process.exit(result.error.exitCode);
		}
		return;
	}
	if (result.status === "failed") {
		reportError(result.error);
		return;
	}
	console.log(formatSyncOutcome(verb, result));
}

const listCommand: CommandModule<Record<string, never>, ListArgs> = {
	command: "list",
	describe: "List commands across user, registry, and project locations",
	builder: (yargs) =>
		yargs
			.option("location", {
				alias: "l",
				type: "string",
				describe: `Comma-separated locations to include (${COMMAND_LOCATIONS.join(", ")})`,
			})
			.option("filter", {
				alias: "f",
				type: "string",
				describe: 'Glob on the command name, e.g. "git/*"',
			})
			.option("json", { type: "boolean", default: false, describe: "Output JSON" }),
	handler: async (argv) =>
		await withErrorReporting(async () => {
			const context = await loadWorkingContext();
			const requested = parseLocationList(argv.location);
			const entries = await listCommandCatalog(context, {
				locations: requested,
				pattern: argv.filter,
			});
			if (argv.json) {
				printJson(entries);
				return;
			}
			const shown = requested.length > 0 ? requested : COMMAND_LOCATIONS;
			console.log(formatCatalog(entries, shown));
		}),
};

const statusCommand: CommandModule<Record<string, never>, StatusArgs> = {
	command: "status [name]",
	describe: "Show whether commands are private, available, published, or dirty",
	builder: (yargs) =>
		yargs
			.positional("name", { type: "string", describe: "Command name (default: all)" })
			.option("scope", scopeOption)
			.option("json", { type: "boolean", default: false, describe: "Output JSON" }),
	handler: async (argv) =>
		await withErrorReporting(async () => {
			const context = await loadWorkingContext();
			const pair = resolveCommandSyncPair(context, parseScopeOption(argv.scope));
			const entries = argv.name
				? [{ name: argv.name, status: await getArtifactStatus(pair, argv.name) }]
				: await listArtifactStatuses(pair);
			if (argv.json) {
				printJson(argv.name ? entries[0] : entries);
				return;
			}
			console.log(formatStatuses(entries));
		}),
};

const addCommand: CommandModule<Record<string, never>, AddArgs> = {
	command: "add <name> [prompt]",
	describe: "Create a command in the local scope",
	builder: (yargs) =>
		yargs
			.positional("name", { type: "string", describe: "Command name, e.g. git/commit" })
			.positional("prompt", { type: "string", describe: "Prompt text" })
			.option("desc", { alias: "d", type: "string", describe: "Short description" })
			.option("file", {
				type: "string",
				describe: "Use this file's bytes as the command instead of a prompt",
			})
			.option("scope", scopeOption)
			.option("overwrite", {
				type: "boolean",
				default: false,
				describe: "Replace an existing command with different content",
			})
			.option("json", { type: "boolean", default: false, describe: "Output JSON" })
			.conflicts("file", ["prompt", "desc"]),
	handler: async (argv) =>
		await withErrorReporting(async () => {
			const name = argv.name;
			if (!name) {
				console.error("Error: Missing required argument: name");
				process.exit(2);
				return;
			}
			const context = await loadWorkingContext();
			const pair = resolveCommandSyncPair(context, parseScopeOption(argv.scope));
			const content = argv.file
				? await readContentFile(context.cwd, argv.file)
				: buildCommandDocument({ name, prompt: argv.prompt, description: argv.desc });
			await runSync("add", name, argv.json ?? false, () =>
				addArtifact(pair, name, content, { overwrite: argv.overwrite }),
			);
		}),
};

const showCommandModule: CommandModule<Record<string, never>, NameArgs> = {
	command: "show <name>",
	describe: "Print a command (project, then user, then registry copy)",
	builder: (yargs) =>
		yargs.positional("name", { type: "string", describe: "Command name" }),
	handler: async (argv) =>
		await withErrorReporting(async () => {
			const context = await loadWorkingContext();
			const shown = await showCommand(context, argv.name ?? "");
			console.log(`Command: ${shown.name} (${shown.location})`);
			console.log(`Path: ${shown.path}`);
			if (shown.description) {
				console.log(`Description: ${shown.description}`);
			}
			console.log("");
			console.log(shown.prompt ?? shown.contents);
		}),
};

const diffCommand: CommandModule<Record<string, never>, NameArgs> = {
	command: "diff <name>",
	describe: "Show how the local copy differs from the registry copy",
	builder: (yargs) =>
		yargs
			.positional("name", { type: "string", describe: "Command name" })
			.option("scope", scopeOption),
	handler: async (argv) =>
		await withErrorReporting(async () => {
			const context = await loadWorkingContext();
			const pair = resolveCommandSyncPair(context, parseScopeOption(argv.scope));
			const diff = await diffArtifact(pair, argv.name ?? "");
			if (!hasDifferences(diff.changes)) {
				console.log(`No differences for "${diff.name}".`);
				return;
			}
			console.log(formatUnifiedDiff(diff).trimEnd());
		}),
};

function transferCommand(
	verb: "publish" | "install",
	describe: string,
	operation: (pair: SyncPair, name: string, force: boolean) => Promise<SyncOutcome>,
): CommandModule<Record<string, never>, TransferArgs> {
	return {
		command: `${verb} <name>`,
		describe,
		builder: (yargs) =>
			yargs
				.positional("name", { type: "string", describe: "Command name" })
				.option("scope", scopeOption)
				.option("force", {
					type: "boolean",
					default: false,
					describe: "Overwrite a differing destination copy",
				})
				.option("json", { type: "boolean", default: false, describe: "Output JSON" }),
		handler: async (argv) =>
			await withErrorReporting(async () => {
				const name = argv.name ?? "";
				const context = await loadWorkingContext();
				const pair = resolveCommandSyncPair(context, parseScopeOption(argv.scope));
				await runSync(verb, name, argv.json ?? false, () =>
					operation(pair, name, argv.force ?? false),
				);
			}),
	};
}

const removeCommand: CommandModule<Record<string, never>, NameArgs> = {
	command: "remove <name>",
	describe: "Delete a command from one location",
	builder: (yargs) =>
		yargs.positional("name", { type: "string", describe: "Command name" }).option("scope", {
			type: "string",
			choices: [...COMMAND_LOCATIONS],
			describe: "Location to delete from (default: project inside a repository, else user)",
		}),
	handler: async (argv) =>
		await withErrorReporting(async () => {
			const context = await loadWorkingContext();
			const location = parseLocationOption(argv.scope) ?? defaultWriteScope(context);
			const removedPath = await removeArtifact(
				resolveLocationStore(context, location),
				argv.name ?? "",
			);
			console.log(`Removed "${argv.name}" from ${removedPath}.`);
		}),
};

export const commandsCommand: CommandModule = {
	command: "commands",
	describe: "Manage slash commands and sync them with the registry",
	builder: (yargs) =>
		yargs
			.command(listCommand)
			.command(statusCommand)
			.command(addCommand)
			.command(showCommandModule)
			.command(diffCommand)
			.command(
				transferCommand("publish", "Copy a local command into the registry", (pair, name, force) =>
					publishArtifact(pair, name, { force }),
				),
			)
			.command(
				transferCommand("install", "Copy a registry command into the local scope", (pair, name, force) =>
					installArtifact(pair, name, { force }),
				),
			)
			.command(removeCommand)
			.demandCommand(1, "Specify a commands subcommand."),
	handler: () => undefined,
};
