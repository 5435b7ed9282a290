import { readFile } from "node:fs/promises";
import { z } from "zod";
import { writeFileAtomic } from "../artifacts/atomic-write.js";
import { errnoCode, IoError } from "../errors.js";
import type { LaunchSpec } from "./types.js";

const rawServerSchema = z.record(z.unknown());

const settingsSchema = z
	.object({
		mcpServers: z.record(rawServerSchema).optional(),
	})
	.passthrough();

const serverConfigSchema = z.union([
	z.object({
		command: z.string().min(1),
		args: z.array(z.string()).default([]),
		env: z.record(z.string()).optional(),
	}),
	z.object({ url: z.string().min(1) }),
	z.object({ httpUrl: z.string().min(1) }),
]);

export type RawServerConfig = z.infer<typeof rawServerSchema>;
export type SettingsDocument = z.infer<typeof settingsSchema>;

function formatIssues(error: z.ZodError): string {
	return error.issues
		.map((issue) => {
			const location = issue.path.length > 0 ? issue.path.join(".") : "(root)";
			return `${location}: ${issue.message}`;
		})
		.join("; ");
}

/** Read a scope's settings.json; a missing file is an empty document. */
export async function readSettings(filePath: string): Promise<SettingsDocument> {
	let contents: string;
	try {
		contents = await readFile(filePath, "utf8");
	} catch (error) {
		if (errnoCode(error) === "ENOENT") {
			return {};
		}
		throw new IoError(`Failed to read ${filePath}`, error);
	}

	if (!contents.trim()) {
		return {};
	}

	let parsed: unknown;
	try {
		parsed = JSON.parse(contents);
	} catch (error) {
		throw new IoError(`Settings file is not valid JSON: ${filePath}`, error);
	}

	const result = settingsSchema.safeParse(parsed);
	if (!result.success) {
		throw new IoError(`Settings file has an invalid shape (${formatIssues(result.error)}): ${filePath}`);
	}
	return result.data;
}

export async function writeSettings(filePath: string, settings: SettingsDocument): Promise<void> {
	await writeFileAtomic(filePath, `${JSON.stringify(settings, null, 2)}\n`);
}

export function parseLaunchSpec(name: string, raw: RawServerConfig, filePath: string): LaunchSpec {
	const result = serverConfigSchema.safeParse(raw);
	if (!result.success) {
		throw new IoError(
			`MCP server "${name}" in ${filePath} needs a "command" or a "url" (${formatIssues(result.error)})`,
		);
	}

	const config = result.data;
	if ("command" in config) {
		return {
			transport: "stdio",
			command: config.command,
			args: config.args,
			...(config.env ? { env: config.env } : {}),
		};
	}
	if ("url" in config) {
		return { transport: "http", url: config.url };
	}
	return { transport: "http", url: config.httpUrl };
}

export function toServerConfig(launch: LaunchSpec): RawServerConfig {
	if (launch.transport === "http") {
		return { url: launch.url };
	}
	return {
		command: launch.command,
		args: launch.args,
		...(launch.env ? { env: launch.env } : {}),
	};
}
