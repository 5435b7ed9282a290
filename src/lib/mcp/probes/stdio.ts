import {
	type ChildProcess,
	spawn as defaultSpawn,
	type SpawnOptions,
} from "node:child_process";
import { classifyLine, INITIALIZE_REQUEST, timedOut, unreachable } from "../protocol.js";
import type { HealthResult, LaunchSpec, ProbeOptions, ServerProbe } from "../types.js";

export type SpawnFn = (command: string, args: readonly string[], options: SpawnOptions) => ChildProcess;

export type StdioProbeOptions = {
	spawn?: SpawnFn;
	env?: NodeJS.ProcessEnv;
	/** How long a child gets to exit after SIGTERM before it is sent SIGKILL. */
	killGraceMs?: number;
};

export const DEFAULT_KILL_GRACE_MS = 1000;

function describeExit(code: number | null, signal: NodeJS.Signals | null): string {
	if (code !== null) {
		return `exit code ${code}`;
	}
	return `signal ${signal ?? "unknown"}`;
}

/**
 * Launches the server, sends an initialize request on stdin and waits for the matching
 * response on stdout. Once an outcome is known the pipes are closed and the child is
 * sent SIGTERM, then SIGKILL if it is still running after the grace period.
 */
export class StdioServerProbe implements ServerProbe {
	private readonly spawn: SpawnFn;
	private readonly env: NodeJS.ProcessEnv;
	private readonly killGraceMs: number;

	constructor(options: StdioProbeOptions = {}) {
		this.spawn = options.spawn ?? defaultSpawn;
		this.env = options.env ?? process.env;
		this.killGraceMs = options.killGraceMs ?? DEFAULT_KILL_GRACE_MS;
	}

	private terminate(child: ChildProcess, exited: boolean): void {
		child.stdin?.destroy();
		child.stdout?.destroy();
		if (exited) {
			return;
		}
		child.kill("SIGTERM");
		const grace = setTimeout(() => {
			child.kill("SIGKILL");
		}, this.killGraceMs);
		grace.unref();
		child.once("exit", () => clearTimeout(grace));
	}

	async probe(launch: LaunchSpec, options: ProbeOptions): Promise<HealthResult> {
		if (launch.transport !== "stdio") {
			return unreachable(`Cannot launch ${launch.url} as a local process.`);
		}

		let child: ChildProcess;
		try {
			child = this.spawn(launch.command, launch.args, {
				stdio: ["pipe", "pipe", "ignore"],
				env: { ...this.env, ...launch.env },
			});
		} catch (error) {
			const reason = error instanceof Error ? error.message : String(error);
			return unreachable(`Failed to start "${launch.command}": ${reason}`);
		}

		return await new Promise<HealthResult>((resolve) => {
			let settled = false;
			let exited = false;
			let buffered = "";

			const finish = (result: HealthResult) => {
				if (settled) {
					return;
				}
				settled = true;
				clearTimeout(timer);
				this.terminate(child, exited);
				resolve(result);
			};

			const timer = setTimeout(() => finish(timedOut(options.timeoutMs)), options.timeoutMs);

			child.on("error", (error) => {
				exited = true;
				finish(unreachable(`Failed to start "${launch.command}": ${error.message}`));
			});
			child.on("exit", (code, signal) => {
				exited = true;
				finish(unreachable(`Server exited before responding (${describeExit(code, signal)}).`));
			});

			child.stdout?.setEncoding("utf8");
			child.stdout?.on("data", (chunk: string) => {
				buffered += chunk;
				let newline = buffered.indexOf("\n");
				while (newline >= 0) {
					const line = buffered.slice(0, newline).trim();
					buffered = buffered.slice(newline + 1);
					const result = line ? classifyLine(line) : null;
					if (result) {
						finish(result);
						return;
					}
					newline = buffered.indexOf("\n");
				}
			});

			child.stdin?.on("error", (error) => {
				finish(unreachable(`Failed to write to "${launch.command}": ${error.message}`));
			});
			child.stdin?.write(`${JSON.stringify(INITIALIZE_REQUEST)}\n`);
		});
	}
}
