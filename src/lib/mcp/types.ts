import type { Scope } from "../scopes.js";

export type StdioLaunchSpec = {
	transport: "stdio";
	command: string;
	args: string[];
	env?: Record<string, string>;
};

export type HttpLaunchSpec = {
	transport: "http";
	url: string;
};

export type LaunchSpec = StdioLaunchSpec | HttpLaunchSpec;
export type Transport = LaunchSpec["transport"];

export type McpServerEntry = {
	name: string;
	scope: Scope;
	launch: LaunchSpec;
};

export type HealthFailure = "timeout" | "unreachable" | "protocol-error";

export type HealthResult =
	| { healthy: true; version: string; serverName: string | null }
	| { healthy: false; error: HealthFailure; message: string };

export type ProbeOptions = {
	timeoutMs: number;
};

/** One way of reaching a server and asking it who it is. */
export interface ServerProbe {
	probe(launch: LaunchSpec, options: ProbeOptions): Promise<HealthResult>;
}
