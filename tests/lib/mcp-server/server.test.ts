import { Client } from "@modelcontextprotocol/sdk/client/index.js";
import { InMemoryTransport } from "@modelcontextprotocol/sdk/inMemory.js";
import { z } from "zod";
import type { WorkingContext } from "../../../src/lib/config.js";
import { registerServer } from "../../../src/lib/mcp/registry.js";
import type { ServerProbe } from "../../../src/lib/mcp/types.js";
import { createToolServer } from "../../../src/lib/mcp-server/server.js";
import { resolveLocationStore } from "../../../src/lib/slash-commands/catalog.js";
import { createTestContext, withTempDir } from "../../helpers/context.js";

const toolResultSchema = z.object({
	content: z.array(z.object({ type: z.literal("text"), text: z.string() })),
	isError: z.boolean().optional(),
});

type ToolSession = {
	call: (
		name: string,
		args?: Record<string, unknown>,
	) => Promise<{ isError: boolean; payload: unknown }>;
	close: () => Promise<void>;
};

async function connect(
	context: WorkingContext,
	probes?: { stdio?: ServerProbe },
): Promise<ToolSession> {
	const server = createToolServer(context, { probes });
	const client = new Client({ name: "test-client", version: "0.0.0" });
	const [clientTransport, serverTransport] = InMemoryTransport.createLinkedPair();
	await server.connect(serverTransport);
	await client.connect(clientTransport);

	return {
		call: async (name, args = {}) => {
			const result = toolResultSchema.parse(await client.callTool({ name, arguments: args }));
			return { isError: result.isError ?? false, payload: JSON.parse(result.content[0].text) };
		},
		close: async () => {
			await client.close();
			await server.close();
		},
	};
}

describe("MCP tool server", () => {
	it("lists the tools it serves", async () => {
		await withTempDir(async (root) => {
			const context = createTestContext(root);
			const server = createToolServer(context);
			const client = new Client({ name: "test-client", version: "0.0.0" });
			const [clientTransport, serverTransport] = InMemoryTransport.createLinkedPair();
			await server.connect(serverTransport);
			await client.connect(clientTransport);

			const { tools } = await client.listTools();

			expect(tools.map((tool) => tool.name).sort()).toEqual([
				"add_slash_command",
				"check_mcp_server",
				"install_slash_command",
				"list_mcp_servers",
				"list_slash_commands",
				"publish_slash_command",
				"slash_command_status",
			]);
			await client.close();
			await server.close();
		});
	});

	it("adds, publishes, and reports slash commands", async () => {
		await withTempDir(async (root) => {
			const context = createTestContext(root);
			const session = await connect(context);
			try {
				const added = await session.call("add_slash_command", {
					name: "my-fix",
					prompt: "Explain this bug",
				});
				expect(added).toEqual({
					isError: false,
					payload: {
						status: "applied",
						name: "my-fix",
						path: resolveLocationStore(context, "user").pathFor("my-fix"),
						artifactStatus: "private",
					},
				});

				expect((await session.call("publish_slash_command", { name: "my-fix" })).payload).toMatchObject({
					status: "applied",
					artifactStatus: "published",
				});
				expect((await session.call("slash_command_status", { name: "my-fix" })).payload).toEqual({
					name: "my-fix",
					status: "published",
				});

				const listed = await session.call("list_slash_commands", { filter_pattern: "my-*" });
				expect(listed.payload).toMatchObject({ commands: [{ name: "my-fix", synced: true }] });
			} finally {
				await session.close();
			}
		});
	});

	it("returns typed failures as tool errors", async () => {
		await withTempDir(async (root) => {
			const session = await connect(createTestContext(root));
			try {
				expect(await session.call("install_slash_command", { name: "ghost" })).toEqual({
					isError: true,
					payload: {
						error: { code: "not-found", message: 'Command "ghost" not found in the registry.' },
					},
				});
			} finally {
				await session.close();
			}
		});
	});

	it("lists and checks MCP servers", async () => {
		await withTempDir(async (root) => {
			const context = createTestContext(root);
			await registerServer(context, {
				name: "git",
				launch: { transport: "stdio", command: "git-mcp", args: [] },
			});
			const stdio: ServerProbe = {
				probe: async () => ({ healthy: true, version: "4.5.6", serverName: "git" }),
			};
			const session = await connect(context, { stdio });
			try {
				expect((await session.call("list_mcp_servers")).payload).toEqual({
					servers: [
						{
							name: "git",
							scope: "user",
							launch: { transport: "stdio", command: "git-mcp", args: [] },
						},
					],
				});
				expect((await session.call("check_mcp_server", { name: "git" })).payload).toEqual({
					name: "git",
					scope: "user",
					healthy: true,
					version: "4.5.6",
					serverName: "git",
				});
			} finally {
				await session.close();
			}
		});
	});
});
