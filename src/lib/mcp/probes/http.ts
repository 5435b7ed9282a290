import { classifyLine, INITIALIZE_REQUEST, protocolError, timedOut, unreachable } from "../protocol.js";
import type { HealthResult, LaunchSpec, ProbeOptions, ServerProbe } from "../types.js";

export type FetchFn = typeof fetch;

export type HttpProbeOptions = {
	fetch?: FetchFn;
};

function parseEventStream(body: string): HealthResult {
	for (const rawLine of body.split(/\r?\n/)) {
		if (!rawLine.startsWith("data:")) {
			continue;
		}
		const result = classifyLine(rawLine.slice("data:".length).trim());
		if (result) {
			return result;
		}
	}
	return protocolError("Event stream ended without an initialize response.");
}

/**
 * Posts an initialize request to a streamable-HTTP server. Both plain JSON and
 * server-sent-event responses are understood.
 */
export class HttpServerProbe implements ServerProbe {
	private readonly fetch: FetchFn;

	constructor(options: HttpProbeOptions = {}) {
		this.fetch = options.fetch ?? fetch;
	}

	async probe(launch: LaunchSpec, options: ProbeOptions): Promise<HealthResult> {
		if (launch.transport !== "http") {
			return unreachable(`"${launch.command}" is a local process, not an HTTP server.`);
		}

		const controller = new AbortController();
		const timer = setTimeout(() => controller.abort(), options.timeoutMs);
		try {
			const response = await this.fetch(launch.url, {
				method: "POST",
				headers: {
					"content-type": "application/json",
					accept: "application/json, text/event-stream",
				},
				body: JSON.stringify(INITIALIZE_REQUEST),
				signal: controller.signal,
			});
			if (!response.ok) {
				return protocolError(`Server answered HTTP ${response.status}.`);
			}

			const body = await response.text();
			if ((response.headers.get("content-type") ?? "").includes("text/event-stream")) {
				return parseEventStream(body);
			}
			return (
				classifyLine(body.trim()) ?? protocolError("Response was not the initialize result.")
			);
		} catch (error) {
			if (controller.signal.aborted) {
				return timedOut(options.timeoutMs);
			}
			const reason = error instanceof Error ? error.message : String(error);
			return unreachable(`Could not reach ${launch.url}: ${reason}`);
		} finally {
			clearTimeout(timer);
		}
	}
}
