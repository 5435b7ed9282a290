#!/usr/bin/env node
import { realpathSync } from "node:fs";
import { pathToFileURL } from "node:url";
import yargs from "yargs";
import { hideBin } from "yargs/helpers";
import { EXIT_CODES, isAgentCfgError } from "../lib/errors.js";
import { commandsCommand } from "./commands/commands.js";
import { contextCommand } from "./commands/context.js";
import { mcpCommand } from "./commands/mcp.js";
import { serveCommand } from "./commands/serve.js";

const VERSION = "0.1.0";
const ENVIRONMENT_HELP = [
	"Environment:",
	"  AGENTCFG_USER_DIR           User configuration root (default: ~/.gemini)",
	"  AGENTCFG_PROJECT_DIR        Project directory (default: repository root or cwd)",
	"  AGENTCFG_REPO_DIR           Shared registry repository",
	"  AGENTCFG_HEALTH_TIMEOUT_MS  Default MCP health-check deadline (default: 5000)",
].join("\n");

function formatError(message: string): string {
	if (message.startsWith("Unknown argument:") || message.startsWith("Unknown arguments:")) {
		const raw = message.replace(/Unknown arguments?:/, "").trim();
		const option = raw.startsWith("-") ? raw : `--${raw}`;
		return `Error: Unknown option: ${option}`;
	}
	return `Error: ${message}`;
}

export function runCli(argv = process.argv) {
	const args = hideBin(argv);
	let handledFailure = false;

	return yargs(args)
		.scriptName("agentcfg")
		.version(VERSION)
		.help()
		.strict()
		.strictCommands()
		.exitProcess(false)
		.fail((msg, err) => {
			if (handledFailure) {
				return;
			}

			handledFailure = true;
			if (isAgentCfgError(err)) {
				console.error(`Error: ${err.message}`);
				process.exit(err.exitCode);
				return;
			}
			const message = msg || err?.message || "Unknown error";
			console.error(formatError(message));
			process.exit(msg ? EXIT_CODES["invalid-usage"] : EXIT_CODES.failure);
		})
		.command(commandsCommand)
		.command(mcpCommand)
		.command(contextCommand)
		.command(serveCommand)
		.demandCommand(1, "Specify a command.")
		.epilog(ENVIRONMENT_HELP)
		.parseAsync();
}

const entry = process.argv[1];
if (entry) {
	const entryUrl = pathToFileURL(realpathSync(entry)).href;
	if (entryUrl === import.meta.url) {
		await runCli();
	}
}
