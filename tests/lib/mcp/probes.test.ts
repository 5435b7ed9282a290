import type { ChildProcess, SpawnOptions } from "node:child_process";
import { EventEmitter } from "node:events";
import { PassThrough } from "node:stream";
import { type FetchFn, HttpServerProbe } from "../../../src/lib/mcp/probes/http.js";
import { type SpawnFn, StdioServerProbe } from "../../../src/lib/mcp/probes/stdio.js";
import { INITIALIZE_REQUEST } from "../../../src/lib/mcp/protocol.js";
import type { LaunchSpec } from "../../../src/lib/mcp/types.js";

type FakeChild = EventEmitter & {
	stdin: PassThrough;
	stdout: PassThrough;
	kill: ReturnType<typeof vi.fn>;
	received: string[];
};

function createFakeChild(respond?: (child: FakeChild, line: string) => void): FakeChild {
	const child = Object.assign(new EventEmitter(), {
		stdin: new PassThrough(),
		stdout: new PassThrough(),
		kill: vi.fn(),
		received: [] as string[],
	});
	child.stdin.setEncoding("utf8");
	child.stdin.on("data", (chunk: string) => {
		for (const line of chunk.split("\n").filter(Boolean)) {
			child.received.push(line);
			respond?.(child, line);
		}
	});
	return child;
}

function spawnReturning(child: FakeChild) {
	const calls: Array<{ command: string; args: readonly string[]; options: SpawnOptions }> = [];
	const spawn: SpawnFn = (command, args, options) => {
		calls.push({ command, args, options });
		return child as unknown as ChildProcess;
	};
	return { spawn, calls };
}

const stdioLaunch: LaunchSpec = {
	transport: "stdio",
	command: "fake-server",
	args: ["--stdio"],
	env: { FAKE_TOKEN: "test-secret" },
};

const initializeResult = (version: string) => ({
	jsonrpc: "2.0",
	id: 1,
	result: {
		protocolVersion: "2024-11-05",
		capabilities: {},
		serverInfo: { name: "fake", version },
	},
});

describe("StdioServerProbe", () => {
	it("reports the version from the initialize response", async () => {
		const child = createFakeChild((fake) => {
			fake.stdout.write(`${JSON.stringify({ jsonrpc: "2.0", method: "notifications/message" })}\n`);
			fake.stdout.write(`${JSON.stringify(initializeResult("1.2.3"))}\n`);
		});
		const { spawn, calls } = spawnReturning(child);

		const result = await new StdioServerProbe({ spawn, env: { PATH: "/bin" } }).probe(stdioLaunch, {
			timeoutMs: 1000,
		});

		expect(result).toEqual({ healthy: true, version: "1.2.3", serverName: "fake" });
		expect(JSON.parse(child.received[0])).toEqual(INITIALIZE_REQUEST);
		expect(calls[0].command).toBe("fake-server");
		expect(calls[0].args).toEqual(["--stdio"]);
		expect(calls[0].options.env).toEqual({ PATH: "/bin", FAKE_TOKEN: "test-secret" });
		expect(child.kill).toHaveBeenCalled();
	});

	it("handles a response split across chunks", async () => {
		const child = createFakeChild((fake) => {
			const text = `${JSON.stringify(initializeResult("2.0.0"))}\n`;
			fake.stdout.write(text.slice(0, 10));
			fake.stdout.write(text.slice(10));
		});
		const { spawn } = spawnReturning(child);

		const result = await new StdioServerProbe({ spawn }).probe(stdioLaunch, { timeoutMs: 1000 });

		expect(result).toEqual({ healthy: true, version: "2.0.0", serverName: "fake" });
	});

	it("times out when the server never answers", async () => {
		const child = createFakeChild();
		const { spawn } = spawnReturning(child);

		const result = await new StdioServerProbe({ spawn }).probe(stdioLaunch, { timeoutMs: 30 });

		expect(result).toEqual({ healthy: false, error: "timeout", message: "No response within 30ms." });
		expect(child.kill).toHaveBeenCalled();
	});

	it("closes the pipes and sends SIGKILL to a server that ignores SIGTERM", async () => {
		const child = createFakeChild();
		const { spawn } = spawnReturning(child);

		const result = await new StdioServerProbe({ spawn, killGraceMs: 10 }).probe(stdioLaunch, {
			timeoutMs: 20,
		});

		expect(result).toMatchObject({ healthy: false, error: "timeout" });
		expect(child.stdin.destroyed).toBe(true);
		expect(child.stdout.destroyed).toBe(true);
		expect(child.kill).toHaveBeenCalledWith("SIGTERM");
		await vi.waitFor(() => expect(child.kill).toHaveBeenCalledWith("SIGKILL"));
	});

	it("does not send SIGKILL once the server exits on SIGTERM", async () => {
		const child = createFakeChild();
		child.kill.mockImplementation((signal: string) => {
			if (signal === "SIGTERM") {
				child.emit("exit", null, "SIGTERM");
			}
			return true;
		});
		const { spawn } = spawnReturning(child);

		await new StdioServerProbe({ spawn, killGraceMs: 10 }).probe(stdioLaunch, { timeoutMs: 20 });
		await new Promise((resolve) => setTimeout(resolve, 40));

		expect(child.kill).toHaveBeenCalledTimes(1);
		expect(child.kill).toHaveBeenCalledWith("SIGTERM");
	});

	it("does not signal a server that already exited", async () => {
		const child = createFakeChild((fake) => fake.emit("exit", 0, null));
		const { spawn } = spawnReturning(child);

		await new StdioServerProbe({ spawn, killGraceMs: 10 }).probe(stdioLaunch, { timeoutMs: 1000 });

		expect(child.kill).not.toHaveBeenCalled();
	});

	it("reports a launch failure as unreachable", async () => {
		const child = createFakeChild();
		const { spawn } = spawnReturning(child);
		setImmediate(() => child.emit("error", new Error("spawn fake-server ENOENT")));

		const result = await new StdioServerProbe({ spawn }).probe(stdioLaunch, { timeoutMs: 1000 });

		expect(result).toEqual({
			healthy: false,
			error: "unreachable",
			message: 'Failed to start "fake-server": spawn fake-server ENOENT',
		});
	});

	it("reports an early exit as unreachable", async () => {
		const child = createFakeChild((fake) => fake.emit("exit", 1, null));
		const { spawn } = spawnReturning(child);

		const result = await new StdioServerProbe({ spawn }).probe(stdioLaunch, { timeoutMs: 1000 });

		expect(result).toEqual({
			healthy: false,
			error: "unreachable",
			message: "Server exited before responding (exit code 1).",
		});
	});

	it("reports a spawn that throws as unreachable", async () => {
		const spawn: SpawnFn = () => {
			throw new Error("EACCES");
		};

		const result = await new StdioServerProbe({ spawn }).probe(stdioLaunch, { timeoutMs: 1000 });

		expect(result).toMatchObject({ healthy: false, error: "unreachable" });
	});

	it("reports malformed output as a protocol error", async () => {
		const child = createFakeChild((fake) => fake.stdout.write("Starting server...\n"));
		const { spawn } = spawnReturning(child);

		const result = await new StdioServerProbe({ spawn }).probe(stdioLaunch, { timeoutMs: 1000 });

		expect(result).toMatchObject({ healthy: false, error: "protocol-error" });
	});

	it("reports a response without a version as a protocol error", async () => {
		const child = createFakeChild((fake) =>
			fake.stdout.write(`${JSON.stringify({ jsonrpc: "2.0", id: 1, result: { serverInfo: { name: "x" } } })}\n`),
		);
		const { spawn } = spawnReturning(child);

		const result = await new StdioServerProbe({ spawn }).probe(stdioLaunch, { timeoutMs: 1000 });

		expect(result).toEqual({
			healthy: false,
			error: "protocol-error",
			message: "Initialize response did not include serverInfo.version.",
		});
	});

	it("reports an error response as a protocol error", async () => {
		const child = createFakeChild((fake) =>
			fake.stdout.write(
				`${JSON.stringify({ jsonrpc: "2.0", id: 1, error: { code: -32600, message: "bad" } })}\n`,
			),
		);
		const { spawn } = spawnReturning(child);

		const result = await new StdioServerProbe({ spawn }).probe(stdioLaunch, { timeoutMs: 1000 });

		expect(result).toEqual({
			healthy: false,
			error: "protocol-error",
			message: "Server rejected initialize (-32600): bad",
		});
	});
});

const httpLaunch: LaunchSpec = { transport: "http", url: "http://mcp.test/mcp" };

describe("HttpServerProbe", () => {
	it("reads a JSON initialize response", async () => {
		const requests: Array<RequestInit | undefined> = [];
		const fetchStub: FetchFn = async (_input, init) => {
			requests.push(init);
			return new Response(JSON.stringify(initializeResult("0.9.0")), {
				headers: { "content-type": "application/json" },
			});
		};

		const result = await new HttpServerProbe({ fetch: fetchStub }).probe(httpLaunch, {
			timeoutMs: 1000,
		});

		expect(result).toEqual({ healthy: true, version: "0.9.0", serverName: "fake" });
		expect(requests[0]?.method).toBe("POST");
		expect(requests[0]?.body).toBe(JSON.stringify(INITIALIZE_REQUEST));
	});

	it("reads an event-stream initialize response", async () => {
		const fetchStub: FetchFn = async () =>
			new Response(`event: message\ndata: ${JSON.stringify(initializeResult("3.1.0"))}\n\n`, {
				headers: { "content-type": "text/event-stream" },
			});

		const result = await new HttpServerProbe({ fetch: fetchStub }).probe(httpLaunch, {
			timeoutMs: 1000,
		});

		expect(result).toEqual({ healthy: true, version: "3.1.0", serverName: "fake" });
	});

	it("classifies HTTP errors, network failures, and timeouts", async () => {
		const failing: FetchFn = async () => new Response("nope", { status: 500 });
		const refused: FetchFn = async () => {
			throw new TypeError("fetch failed");
		};
		const hanging: FetchFn = (_input, init) =>
			new Promise<Response>((_resolve, reject) => {
				init?.signal?.addEventListener("abort", () => reject(new Error("aborted")));
			});

		expect(await new HttpServerProbe({ fetch: failing }).probe(httpLaunch, { timeoutMs: 1000 })).toEqual({
			healthy: false,
			error: "protocol-error",
			message: "Server answered HTTP 500.",
		});
		expect(await new HttpServerProbe({ fetch: refused }).probe(httpLaunch, { timeoutMs: 1000 })).toEqual({
			healthy: false,
			error: "unreachable",
			message: "Could not reach http://mcp.test/mcp: fetch failed",
		});
		expect(await new HttpServerProbe({ fetch: hanging }).probe(httpLaunch, { timeoutMs: 20 })).toEqual({
			healthy: false,
			error: "timeout",
			message: "No response within 20ms.",
		});
	});
});
