import type { CommandModule } from "yargs";
import { loadWorkingContext } from "../../lib/config.js";
import { serveStdio } from "../../lib/mcp-server/server.js";

export const serveCommand: CommandModule = {
	command: "serve",
	describe: "Run the agentcfg MCP server over stdio",
	handler: async () => {
		const context = await loadWorkingContext();
		await serveStdio(context);
	},
};
