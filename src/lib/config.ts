import os from "node:os";
import path from "node:path";
import { findRepoRoot } from "./repo-root.js";

export const ENV_USER_DIR = "AGENTCFG_USER_DIR";
export const ENV_PROJECT_DIR = "AGENTCFG_PROJECT_DIR";
export const ENV_REPO_DIR = "AGENTCFG_REPO_DIR";
export const ENV_HEALTH_TIMEOUT = "AGENTCFG_HEALTH_TIMEOUT_MS";

export const DEFAULT_USER_DIRNAME = ".gemini";
export const DEFAULT_HEALTH_TIMEOUT_MS = 5000;

/**
 * Everything the core needs to know about where it runs. Built once per invocation
 * and passed down explicitly; nothing below the CLI reads `process.cwd()` or the
 * environment on its own.
 */
export type WorkingContext = {
	cwd: string;
	homeDir: string | null;
	userDir: string | null;
	projectDir: string;
	repoRoot: string | null;
	registryDir: string | null;
	healthTimeoutMs: number;
};

export type LoadWorkingContextOptions = {
	cwd?: string;
	env?: NodeJS.ProcessEnv;
	homeDir?: string | null;
};

function normalizeValue(value?: string | null): string | null {
	if (!value) {
		return null;
	}
	const trimmed = value.trim();
	return trimmed.length > 0 ? trimmed : null;
}

function resolveHomeDir(): string | null {
	try {
		return normalizeValue(os.homedir());
	} catch {
		return null;
	}
}

export function parseTimeout(value?: string | null): number | null {
	const normalized = normalizeValue(value);
	if (!normalized || !/^\d+$/.test(normalized)) {
		return null;
	}
	const parsed = Number(normalized);
	return parsed > 0 ? parsed : null;
}

export async function loadWorkingContext(
	options: LoadWorkingContextOptions = {},
): Promise<WorkingContext> {
	const cwd = path.resolve(options.cwd ?? process.cwd());
	const env = options.env ?? process.env;
	const homeDir = options.homeDir === undefined ? resolveHomeDir() : options.homeDir;

	const userOverride = normalizeValue(env[ENV_USER_DIR]);
	const projectOverride = normalizeValue(env[ENV_PROJECT_DIR]);
	const registryOverride = normalizeValue(env[ENV_REPO_DIR]);

	let userDir: string | null = null;
	if (userOverride) {
		userDir = path.resolve(cwd, userOverride);
	} else if (homeDir) {
		userDir = path.join(homeDir, DEFAULT_USER_DIRNAME);
	}

	const repoRoot = await findRepoRoot(cwd);
	const projectDir = projectOverride ? path.resolve(cwd, projectOverride) : (repoRoot ?? cwd);

	return {
		cwd,
		homeDir,
		userDir,
		projectDir,
		repoRoot,
		registryDir: registryOverride ? path.resolve(cwd, registryOverride) : null,
		healthTimeoutMs: parseTimeout(env[ENV_HEALTH_TIMEOUT]) ?? DEFAULT_HEALTH_TIMEOUT_MS,
	};
}
