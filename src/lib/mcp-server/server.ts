import { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { StdioServerTransport } from "@modelcontextprotocol/sdk/server/stdio.js";
import type { CallToolResult } from "@modelcontextprotocol/sdk/types.js";
import { z } from "zod";
import type { WorkingContext } from "../config.js";
import { isAgentCfgError } from "../errors.js";
import { checkServerHealth, type HealthCheckOptions } from "../mcp/health.js";
import { findServer, listServers } from "../mcp/registry.js";
import { listCommandCatalog } from "../slash-commands/catalog.js";
import { buildCommandDocument } from "../slash-commands/format.js";
import { addArtifact, installArtifact, publishArtifact } from "../slash-commands/operations.js";
import {
	getArtifactStatus,
	listArtifactStatuses,
	resolveCommandSyncPair,
} from "../slash-commands/status.js";

export const SERVER_NAME = "agentcfg";
export const SERVER_VERSION = "0.1.0";

export type ToolServerOptions = {
	probes?: HealthCheckOptions["probes"];
};

const scopeSchema = z
	.enum(["user", "project"])
	.optional()
	.describe("user or project (default: project inside a repository, else user)");

function jsonResult(payload: unknown): CallToolResult {
	return { content: [{ type: "text" as const, text: JSON.stringify(payload, null, 2) }] };
}

/**
 * Run a tool body and turn typed failures into an `isError` result. Unexpected errors
 * propagate so the SDK reports them as internal failures.
 */
async function runTool(body: () => Promise<unknown>): Promise<CallToolResult> {
	try {
		return jsonResult(await body());
	} catch (error) {
		if (!isAgentCfgError(error)) {
			throw error;
		}
		return {
			content: [
				{
					type: "text" as const,
					text: JSON.stringify({ error: { code: error.code, message: error.message } }, null, 2),
				},
			],
			isError: true,
		};
	}
}

export function createToolServer(context: WorkingContext, options: ToolServerOptions = {}): McpServer {
	const server = new McpServer({ name: SERVER_NAME, version: SERVER_VERSION });

	server.tool(
		"list_slash_commands",
		"List slash commands across user, project, and registry locations with sync state.",
		{
			filter_pattern: z.string().optional().describe('Shell-style glob on the name, e.g. "commit*"'),
		},
		async ({ filter_pattern }) =>
			await runTool(async () => ({
				commands: await listCommandCatalog(context, { pattern: filter_pattern }),
			})),
	);

	server.tool(
		"slash_command_status",
		"Status (private, available, published, dirty) of one command or of every command.",
		{
			name: z.string().optional().describe("Command name; omit for all commands"),
			scope: scopeSchema,
		},
		async ({ name, scope }) =>
			await runTool(async () => {
				const pair = resolveCommandSyncPair(context, scope);
				if (name) {
					return { name, status: await getArtifactStatus(pair, name) };
				}
				return { commands: await listArtifactStatuses(pair) };
			}),
	);

	server.tool(
		"add_slash_command",
		"Create a slash command in the local scope.",
		{
			name: z.string().describe("Command name, e.g. 'fix-bug' or 'git/commit'"),
			prompt: z.string().describe("Prompt text for the command"),
			description: z.string().optional().describe("Short description"),
			scope: scopeSchema,
			overwrite: z.boolean().optional().describe("Replace an existing command with different content"),
		},
		async ({ name, prompt, description, scope, overwrite }) =>
			await runTool(async () => {
				const pair = resolveCommandSyncPair(context, scope);
				const content = buildCommandDocument({ name, prompt, description });
				return await addArtifact(pair, name, content, { overwrite });
			}),
	);

	const transferShape = {
		name: z.string().describe("Command name"),
		scope: scopeSchema,
		force: z.boolean().optional().describe("Overwrite a differing destination copy"),
	};

	server.tool(
		"publish_slash_command",
		"Copy a local slash command into the shared registry.",
		transferShape,
		async ({ name, scope, force }) =>
			await runTool(
				async () =>
					await publishArtifact(resolveCommandSyncPair(context, scope), name, { force }),
			),
	);

	server.tool(
		"install_slash_command",
		"Copy a slash command from the shared registry into the local scope.",
		transferShape,
		async ({ name, scope, force }) =>
			await runTool(
				async () =>
					await installArtifact(resolveCommandSyncPair(context, scope), name, { force }),
			),
	);

	server.tool(
		"list_mcp_servers",
		"List registered MCP servers in project and user scope.",
		{
			filter_pattern: z.string().optional().describe('Shell-style glob on the name, e.g. "git*"'),
			scope: scopeSchema,
		},
		async ({ filter_pattern, scope }) =>
			await runTool(async () => ({
				servers: await listServers(context, { scope, pattern: filter_pattern }),
			})),
	);

	server.tool(
		"check_mcp_server",
		"Start or contact a registered MCP server and report whether it answers initialize.",
		{
			name: z.string().describe("Registered server name"),
			scope: scopeSchema,
			timeout_ms: z.number().int().positive().optional().describe("Deadline in milliseconds"),
		},
		async ({ name, scope, timeout_ms }) =>
			await runTool(async () => {
				const entry = await findServer(context, name, { scope });
				const result = await checkServerHealth(entry, {
					timeoutMs: timeout_ms ?? context.healthTimeoutMs,
					probes: options.probes,
				});
				return { name: entry.name, scope: entry.scope, ...result };
			}),
	);

	return server;
}

/** Serve the tools over stdio until the client disconnects. */
export async function serveStdio(context: WorkingContext): Promise<void> {
	const server = createToolServer(context);
	await server.connect(new StdioServerTransport());
}
