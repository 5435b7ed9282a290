import path from "node:path";
import { ENV_REPO_DIR, ENV_USER_DIR, type WorkingContext } from "./config.js";
import { ScopeUnavailableError } from "./errors.js";

export type Scope = "user" | "project";
export type ScopeIntent = "read" | "write";

/** Read order: project entries overlay user entries. */
export const SCOPES: readonly Scope[] = ["project", "user"];

export const CONFIG_DIRNAME = ".gemini";
export const COMMANDS_DIRNAME = "commands";
export const SETTINGS_FILENAME = "settings.json";
const ALTERNATE_SEGMENTS = [".config", "ai-common"] as const;

export type ScopeRoot = {
	scope: Scope;
	root: string;
	alternateRoot: string;
};

export function isScope(value: unknown): value is Scope {
	return value === "user" || value === "project";
}

export function defaultWriteScope(context: WorkingContext): Scope {
	return context.repoRoot ? "project" : "user";
}

export function resolveScopeRoot(context: WorkingContext, scope: Scope): ScopeRoot {
	if (scope === "project") {
		return {
			scope,
			root: path.join(context.projectDir, CONFIG_DIRNAME),
			alternateRoot: path.join(context.projectDir, ...ALTERNATE_SEGMENTS),
		};
	}

	if (!context.userDir) {
		throw new ScopeUnavailableError(
			`User scope is unavailable: no home directory could be resolved. Set ${ENV_USER_DIR}.`,
		);
	}
	const alternateBase = context.homeDir ?? path.dirname(context.userDir);
	return {
		scope,
		root: context.userDir,
		alternateRoot: path.join(alternateBase, ...ALTERNATE_SEGMENTS),
	};
}

/**
 * Map a requested scope to concrete roots. An explicit scope always wins; otherwise reads
 * cover every scope (project first) and writes target the project when the working
 * directory sits inside a repository, the user scope when it does not.
 */
export function resolveScopeRoots(
	context: WorkingContext,
	scope: Scope | undefined,
	intent: ScopeIntent,
): ScopeRoot[] {
	if (scope) {
		return [resolveScopeRoot(context, scope)];
	}
	if (intent === "write") {
		return [resolveScopeRoot(context, defaultWriteScope(context))];
	}
	return SCOPES.map((candidate) => resolveScopeRoot(context, candidate));
}

export function resolveWriteRoot(context: WorkingContext, scope?: Scope): ScopeRoot {
	const [root] = resolveScopeRoots(context, scope, "write");
	return root;
}

export function resolveRegistryRoot(context: WorkingContext): string {
	if (!context.registryDir) {
		throw new ScopeUnavailableError(
			`Registry repository is not configured. Set ${ENV_REPO_DIR} to the shared repository path.`,
		);
	}
	return path.join(context.registryDir, CONFIG_DIRNAME);
}

export function commandsDir(root: string): string {
	return path.join(root, COMMANDS_DIRNAME);
}

export function settingsPath(root: string): string {
	return path.join(root, SETTINGS_FILENAME);
}
