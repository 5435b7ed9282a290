import { z } from "zod";
import type { HealthResult } from "./types.js";

export const CLIENT_NAME = "agentcfg";
export const CLIENT_VERSION = "0.1.0";
export const PROTOCOL_VERSION = "2024-11-05";
export const INITIALIZE_REQUEST_ID = 1;

export const INITIALIZE_REQUEST = {
	jsonrpc: "2.0",
	id: INITIALIZE_REQUEST_ID,
	method: "initialize",
	params: {
		protocolVersion: PROTOCOL_VERSION,
		capabilities: {},
		clientInfo: { name: CLIENT_NAME, version: CLIENT_VERSION },
	},
} as const;

const messageSchema = z.object({
	jsonrpc: z.literal("2.0"),
	id: z.union([z.number(), z.string()]).optional(),
});

const errorResponseSchema = z.object({
	error: z.object({
		code: z.number(),
		message: z.string(),
	}),
});

const initializeResultSchema = z.object({
	result: z.object({
		serverInfo: z.object({
			name: z.string().optional(),
			version: z.string().min(1),
		}),
	}),
});

export function protocolError(message: string): HealthResult {
	return { healthy: false, error: "protocol-error", message };
}

export function unreachable(message: string): HealthResult {
	return { healthy: false, error: "unreachable", message };
}

export function timedOut(timeoutMs: number): HealthResult {
	return { healthy: false, error: "timeout", message: `No response within ${timeoutMs}ms.` };
}

/**
 * Classify one decoded JSON-RPC message. Returns null for messages that are not the
 * answer to our initialize request (notifications, other ids) so callers keep reading.
 */
export function classifyMessage(payload: unknown): HealthResult | null {
	const message = messageSchema.safeParse(payload);
	if (!message.success) {
		return protocolError("Server sent a message that is not JSON-RPC 2.0.");
	}
	if (message.data.id !== INITIALIZE_REQUEST_ID) {
		return null;
	}

	const failure = errorResponseSchema.safeParse(payload);
	if (failure.success) {
		const { code, message: reason } = failure.data.error;
		return protocolError(`Server rejected initialize (${code}): ${reason}`);
	}

	const initialized = initializeResultSchema.safeParse(payload);
	if (!initialized.success) {
		return protocolError("Initialize response did not include serverInfo.version.");
	}
	const { name, version } = initialized.data.result.serverInfo;
	return { healthy: true, version, serverName: name ?? null };
}

export function classifyLine(line: string): HealthResult | null {
	let payload: unknown;
	try {
		payload = JSON.parse(line);
	} catch {
		return protocolError(`Server wrote a line that is not JSON: ${line.slice(0, 80)}`);
	}
	return classifyMessage(payload);
}
