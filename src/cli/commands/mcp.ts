import type { CommandModule } from "yargs";
import { loadWorkingContext } from "../../lib/config.js";
import { checkAllServers, checkServerHealth, type ServerHealthReport } from "../../lib/mcp/health.js";
import { buildLaunchSpec, resolveServerName } from "../../lib/mcp/launch-spec.js";
import { findServer, listServers, registerServer, removeServer } from "../../lib/mcp/registry.js";
import { parseScopeOption, parseTimeoutOption, scopeOption } from "../arguments.js";
import {
	describeLaunch,
	formatHealthReport,
	formatServers,
	printJson,
	withErrorReporting,
} from "../output.js";

type AddArgs = {
	name?: string;
	command?: string;
	args?: string;
	url?: string;
	path?: string;
	self?: boolean;
	scope?: string;
	overwrite?: boolean;
};

type ListArgs = {
	scope?: string;
	filter?: string;
	json?: boolean;
};

type RemoveArgs = {
	name?: string;
	scope?: string;
};

type CheckArgs = {
	name?: string;
	scope?: string;
	timeout?: number;
	json?: boolean;
};

const addCommand: CommandModule<Record<string, never>, AddArgs> = {
	command: "add",
	describe: "Register an MCP server",
	builder: (yargs) =>
		yargs
			.option("name", {
				alias: "n",
				type: "string",
				describe: "Server name (derived from the command when omitted)",
			})
			.option("command", { alias: "c", type: "string", describe: "Executable to launch" })
			.option("args", { alias: "a", type: "string", describe: "Arguments, split on whitespace" })
			.option("url", { type: "string", describe: "HTTP endpoint of a running server" })
			.option("path", {
				type: "string",
				describe: "Local package directory whose package.json bin is the server",
			})
			.option("self", { type: "boolean", default: false, describe: "Register agentcfg's own server" })
			.option("scope", scopeOption)
			.option("overwrite", {
				type: "boolean",
				default: false,
				describe: "Replace a server already registered under this name",
			})
			.example("agentcfg mcp add --command mcp-git-tool", 'Registers "git-tool"')
			.example("agentcfg mcp add --name docs --url http://localhost:3000/mcp", "Registers an HTTP server"),
	handler: async (argv) =>
		await withErrorReporting(async () => {
			const context = await loadWorkingContext();
			const { launch, suggestedName } = await buildLaunchSpec({
				command: argv.command,
				args: argv.args,
				url: argv.url,
				path: argv.path,
				self: argv.self,
			});
			const name = resolveServerName(argv.name, suggestedName);
			const result = await registerServer(
				context,
				{ name, launch },
				{ scope: parseScopeOption(argv.scope), overwrite: argv.overwrite },
			);
			const verb = result.replaced ? "Replaced" : "Registered";
			console.log(
				`${verb} MCP server "${result.entry.name}" in ${result.entry.scope} scope (${result.path}).`,
			);
			console.log(`Launch: ${describeLaunch(result.entry.launch)}`);
		}),
};

const listCommand: CommandModule<Record<string, never>, ListArgs> = {
	command: "list",
	describe: "List registered MCP servers",
	builder: (yargs) =>
		yargs
			.option("scope", scopeOption)
			.option("filter", { alias: "f", type: "string", describe: 'Glob on the name, e.g. "git*"' })
			.option("json", { type: "boolean", default: false, describe: "Output JSON" }),
	handler: async (argv) =>
		await withErrorReporting(async () => {
			const context = await loadWorkingContext();
			const entries = await listServers(context, {
				scope: parseScopeOption(argv.scope),
				pattern: argv.filter,
			});
			if (argv.json) {
				printJson(entries);
				return;
			}
			console.log(formatServers(entries));
		}),
};

const removeCommand: CommandModule<Record<string, never>, RemoveArgs> = {
	command: "remove <name>",
	describe: "Remove a registered MCP server",
	builder: (yargs) =>
		yargs
			.positional("name", { type: "string", describe: "Server name" })
			.option("scope", scopeOption),
	handler: async (argv) =>
		await withErrorReporting(async () => {
			const context = await loadWorkingContext();
			const result = await removeServer(context, argv.name ?? "", {
				scope: parseScopeOption(argv.scope),
			});
			console.log(
				`Removed MCP server "${result.entry.name}" from ${result.entry.scope} scope (${result.path}).`,
			);
		}),
};

const checkCommand: CommandModule<Record<string, never>, CheckArgs> = {
	command: "check [name]",
	describe: "Check that registered MCP servers answer an initialize request",
	builder: (yargs) =>
		yargs
			.positional("name", { type: "string", describe: "Server name (default: all)" })
			.option("scope", scopeOption)
			.option("timeout", {
				alias: "t",
				type: "number",
				describe: "Deadline per server in milliseconds",
				defaultDescription: "AGENTCFG_HEALTH_TIMEOUT_MS or 5000",
			})
			.option("json", { type: "boolean", default: false, describe: "Output JSON" }),
	handler: async (argv) =>
		await withErrorReporting(async () => {
			const context = await loadWorkingContext();
			const scope = parseScopeOption(argv.scope);
			const timeoutMs = parseTimeoutOption(argv.timeout) ?? context.healthTimeoutMs;

			let reports: ServerHealthReport[];
			if (argv.name) {
				const entry = await findServer(context, argv.name, { scope });
				reports = [{ entry, result: await checkServerHealth(entry, { timeoutMs }) }];
			} else {
				reports = await checkAllServers(context, { scope, timeoutMs });
			}

			if (argv.json) {
				printJson(
					reports.map((report) => ({
						name: report.entry.name,
						scope: report.entry.scope,
						...report.result,
					})),
				);
			} else if (reports.length === 0) {
				console.log("No MCP servers registered.");
			} else {
				console.log(reports.map(formatHealthReport).join("\n"));
			}

			if (reports.some((report) => !report.result.healthy)) {
				process.exit(1);
			}
		}),
};

export const mcpCommand: CommandModule = {
	command: "mcp",
	describe: "Register, list, remove, and health-check MCP servers",
	builder: (yargs) =>
		yargs
			.command(addCommand)
			.command(listCommand)
			.command(removeCommand)
			.command(checkCommand)
			.demandCommand(1, "Specify an mcp subcommand."),
	handler: () => undefined,
};
