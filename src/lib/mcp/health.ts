import type { WorkingContext } from "../config.js";
import { HttpServerProbe } from "./probes/http.js";
import { StdioServerProbe } from "./probes/stdio.js";
import { timedOut, unreachable } from "./protocol.js";
import { type ListServersOptions, listServers } from "./registry.js";
import type { HealthResult, McpServerEntry, ServerProbe, Transport } from "./types.js";

export type HealthCheckOptions = {
	timeoutMs?: number;
	probes?: Partial<Record<Transport, ServerProbe>>;
};

export type ServerHealthReport = {
	entry: McpServerEntry;
	result: HealthResult;
};

const defaultProbes: Record<Transport, () => ServerProbe> = {
	stdio: () => new StdioServerProbe(),
	http: () => new HttpServerProbe(),
};

function selectProbe(transport: Transport, overrides: HealthCheckOptions["probes"]): ServerProbe {
	return overrides?.[transport] ?? defaultProbes[transport]();
}

/**
 * Ask one server for its version. Never throws: every failure, including a probe that
 * ignores its own deadline, becomes an unhealthy result.
 */
export async function checkServerHealth(
	entry: McpServerEntry,
	options: HealthCheckOptions & { timeoutMs: number },
): Promise<HealthResult> {
	const { timeoutMs } = options;
	const probe = selectProbe(entry.launch.transport, options.probes);

	let timer: NodeJS.Timeout | undefined;
	const deadline = new Promise<HealthResult>((resolve) => {
		timer = setTimeout(() => resolve(timedOut(timeoutMs)), timeoutMs);
	});

	const attempt = probe.probe(entry.launch, { timeoutMs }).catch((error: unknown) => {
		const reason = error instanceof Error ? error.message : String(error);
		return unreachable(`Health check for "${entry.name}" failed: ${reason}`);
	});

	try {
		return await Promise.race([attempt, deadline]);
	} finally {
		clearTimeout(timer);
	}
}

/** Check every listed server in turn; the timeout defaults to the working context's. */
export async function checkAllServers(
	context: WorkingContext,
	options: HealthCheckOptions & ListServersOptions = {},
): Promise<ServerHealthReport[]> {
	const entries = await listServers(context, { scope: options.scope, pattern: options.pattern });
	const timeoutMs = options.timeoutMs ?? context.healthTimeoutMs;
	const reports: ServerHealthReport[] = [];
	for (const entry of entries) {
		reports.push({
			entry,
			result: await checkServerHealth(entry, { timeoutMs, probes: options.probes }),
		});
	}
	return reports;
}
