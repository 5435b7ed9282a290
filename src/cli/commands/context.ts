import type { CommandModule } from "yargs";
import { loadWorkingContext } from "../../lib/config.js";
import { getContextStatus, unifyContext } from "../../lib/context-files.js";
import { InvalidArgumentError } from "../../lib/errors.js";
import { parseScopeOption, scopeOption } from "../arguments.js";
import { formatContextStatus, formatUnifyResult, printJson, withErrorReporting } from "../output.js";

type StatusArgs = {
	scope?: string;
	json?: boolean;
};

type UnifyArgs = {
	scope?: string;
	json?: boolean;
};

const statusCommand: CommandModule<Record<string, never>, StatusArgs> = {
	command: "status",
	describe: "Show CONTEXT.md, CLAUDE.md, and GEMINI.md state per scope",
	builder: (yargs) =>
		yargs
			.option("scope", { ...scopeOption, describe: "Scope to inspect (default: both)" })
			.option("json", { type: "boolean", default: false, describe: "Output JSON" }),
	handler: async (argv) =>
		await withErrorReporting(async () => {
			const context = await loadWorkingContext();
			const statuses = await getContextStatus(context, parseScopeOption(argv.scope));
			if (argv.json) {
				printJson(statuses);
				return;
			}
			console.log(formatContextStatus(statuses));
		}),
};

const unifyCommand: CommandModule<Record<string, never>, UnifyArgs> = {
	command: "unify",
	describe: "Merge CLAUDE.md and GEMINI.md into CONTEXT.md and link both to it",
	builder: (yargs) =>
		yargs
			.option("scope", { ...scopeOption, describe: "Scope to unify" })
			.option("json", { type: "boolean", default: false, describe: "Output JSON" }),
	handler: async (argv) =>
		await withErrorReporting(async () => {
			const scope = parseScopeOption(argv.scope);
			if (!scope) {
				throw new InvalidArgumentError("Pass --scope user or --scope project to unify.");
			}
			const context = await loadWorkingContext();
			const result = await unifyContext(context, scope);
			if (argv.json) {
				printJson(result);
				return;
			}
			console.log(formatUnifyResult(result));
		}),
};

export const contextCommand: CommandModule = {
	command: "context",
	describe: "Inspect and unify assistant context files",
	builder: (yargs) =>
		yargs
			.command(statusCommand)
			.command(unifyCommand)
			.demandCommand(1, "Specify a context subcommand."),
	handler: () => undefined,
};
