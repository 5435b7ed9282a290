import { checkAllServers, checkServerHealth } from "../../../src/lib/mcp/health.js";
import { registerServer } from "../../../src/lib/mcp/registry.js";
import type { HealthResult, McpServerEntry, ServerProbe } from "../../../src/lib/mcp/types.js";
import { createTestContext, withTempDir } from "../../helpers/context.js";

const stdioEntry: McpServerEntry = {
	name: "git",
	scope: "user",
	launch: { transport: "stdio", command: "git-mcp", args: [] },
};

const httpEntry: McpServerEntry = {
	name: "docs",
	scope: "project",
	launch: { transport: "http", url: "http://docs.test/mcp" },
};

function probeReturning(result: HealthResult): ServerProbe & { calls: number } {
	let calls = 0;
	return {
		get calls() {
			return calls;
		},
		probe: async () => {
			calls += 1;
			return result;
		},
	};
}

describe("checkServerHealth", () => {
	it("selects the probe by transport", async () => {
		const stdio = probeReturning({ healthy: true, version: "1.0.0", serverName: "git" });
		const http = probeReturning({ healthy: true, version: "2.0.0", serverName: null });

		const result = await checkServerHealth(httpEntry, { timeoutMs: 100, probes: { stdio, http } });

		expect(result).toEqual({ healthy: true, version: "2.0.0", serverName: null });
		expect(http.calls).toBe(1);
		expect(stdio.calls).toBe(0);
	});

	it("bounds a probe that never settles", async () => {
		const stuck: ServerProbe = { probe: () => new Promise<HealthResult>(() => undefined) };
		const started = Date.now();

		const result = await checkServerHealth(stdioEntry, { timeoutMs: 25, probes: { stdio: stuck } });

		expect(result).toEqual({ healthy: false, error: "timeout", message: "No response within 25ms." });
		expect(Date.now() - started).toBeLessThan(2000);
	});

	it("turns a throwing probe into an unreachable result", async () => {
		const throwing: ServerProbe = {
			probe: async () => {
				throw new Error("socket closed");
			},
		};

		const result = await checkServerHealth(stdioEntry, { timeoutMs: 100, probes: { stdio: throwing } });

		expect(result).toEqual({
			healthy: false,
			error: "unreachable",
			message: 'Health check for "git" failed: socket closed',
		});
	});
});

describe("checkAllServers", () => {
	it("checks every listed server and keeps going after failures", async () => {
		await withTempDir(async (root) => {
			const context = createTestContext(root, { healthTimeoutMs: 40 });
			await registerServer(context, { name: "alpha", launch: stdioEntry.launch }, { scope: "user" });
			await registerServer(context, { name: "beta", launch: httpEntry.launch }, { scope: "user" });

			const seen: number[] = [];
			const stdio: ServerProbe = {
				probe: async (_launch, options) => {
					seen.push(options.timeoutMs);
					return { healthy: false, error: "unreachable", message: "down" };
				},
			};
			const http = probeReturning({ healthy: true, version: "1.0.0", serverName: "beta" });

			const reports = await checkAllServers(context, { probes: { stdio, http } });

			expect(reports.map((report) => [report.entry.name, report.result.healthy])).toEqual([
				["alpha", false],
				["beta", true],
			]);
			expect(seen).toEqual([40]);
		});
	});
});
