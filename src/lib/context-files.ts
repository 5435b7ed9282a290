import type { Stats } from "node:fs";
import { lstat, mkdir, readFile, readlink, rename, symlink } from "node:fs/promises";
import path from "node:path";
import { writeFileAtomic } from "./artifacts/atomic-write.js";
import type { WorkingContext } from "./config.js";
import { ConflictError, errnoCode, IoError, NotFoundError } from "./errors.js";
import { resolveScopeRoot, resolveScopeRoots, type Scope } from "./scopes.js";

export const UNIFIED_FILENAME = "CONTEXT.md";
export const SOURCE_FILES = ["CLAUDE.md", "GEMINI.md"] as const;
export const BACKUP_SUFFIX = ".bak";

export type SourceFileName = (typeof SOURCE_FILES)[number];
export type ContextFileName = typeof UNIFIED_FILENAME | SourceFileName;
export type ContextFileState = "missing" | "present" | "symlink-unified" | "symlink-other";
export type ScopeContextState = "unified" | "partial" | "context-only" | "not-unified";

export type ContextFileStatus = {
	path: string;
	state: ContextFileState;
	symlinkTarget: string | null;
};

export type ScopeContextStatus = {
	scope: Scope;
	state: ScopeContextState;
	files: Record<ContextFileName, ContextFileStatus>;
};

export type UnifyResult = {
	scope: Scope;
	status: "applied" | "unchanged";
	unifiedPath: string;
	sources: SourceFileName[];
	backups: string[];
	symlinks: string[];
};

type ContextPaths = Record<ContextFileName, string>;

function contextPaths(context: WorkingContext, scope: Scope): ContextPaths {
	const root = resolveScopeRoot(context, scope);
	const claudeBase =
		scope === "project" ? context.projectDir : (context.homeDir ?? path.dirname(root.root));
	return {
		"CONTEXT.md": path.join(root.alternateRoot, UNIFIED_FILENAME),
		"CLAUDE.md": path.join(claudeBase, ".claude", "CLAUDE.md"),
		"GEMINI.md": path.join(root.root, "GEMINI.md"),
	};
}

async function inspectFile(filePath: string, unifiedPath: string): Promise<ContextFileStatus> {
	let stats: Stats;
	try {
		stats = await lstat(filePath);
	} catch (error) {
		if (errnoCode(error) === "ENOENT") {
			return { path: filePath, state: "missing", symlinkTarget: null };
		}
		throw new IoError(`Failed to inspect ${filePath}`, error);
	}

	if (!stats.isSymbolicLink()) {
		return { path: filePath, state: "present", symlinkTarget: null };
	}
	const target = path.resolve(path.dirname(filePath), await readlink(filePath));
	return {
		path: filePath,
		state: target === path.resolve(unifiedPath) ? "symlink-unified" : "symlink-other",
		symlinkTarget: target,
	};
}

function scopeState(files: Record<ContextFileName, ContextFileStatus>): ScopeContextState {
	const linked = SOURCE_FILES.filter((name) => files[name].state === "symlink-unified");
	const contextExists = files[UNIFIED_FILENAME].state !== "missing";
	if (contextExists && linked.length === SOURCE_FILES.length) {
		return "unified";
	}
	if (linked.length > 0) {
		return "partial";
	}
	return contextExists ? "context-only" : "not-unified";
}

async function inspectScope(context: WorkingContext, scope: Scope): Promise<ScopeContextStatus> {
	const paths = contextPaths(context, scope);
	const unifiedPath = paths[UNIFIED_FILENAME];
	const files: Record<ContextFileName, ContextFileStatus> = {
		"CONTEXT.md": await inspectFile(unifiedPath, unifiedPath),
		"CLAUDE.md": await inspectFile(paths["CLAUDE.md"], unifiedPath),
		"GEMINI.md": await inspectFile(paths["GEMINI.md"], unifiedPath),
	};
	return { scope, state: scopeState(files), files };
}

/** Without a scope, reports every readable scope (project first). */
export async function getContextStatus(
	context: WorkingContext,
	scope?: Scope,
): Promise<ScopeContextStatus[]> {
	const statuses: ScopeContextStatus[] = [];
	for (const root of resolveScopeRoots(context, scope, "read")) {
		statuses.push(await inspectScope(context, root.scope));
	}
	return statuses;
}

function pad(value: number): string {
	return String(value).padStart(2, "0");
}

export function formatTimestamp(date: Date): string {
	const day = `${date.getFullYear()}-${pad(date.getMonth() + 1)}-${pad(date.getDate())}`;
	const time = `${pad(date.getHours())}:${pad(date.getMinutes())}:${pad(date.getSeconds())}`;
	return `${day} ${time}`;
}

export function importHeader(source: SourceFileName, timestamp: string): string {
	return `*** CONTEXT IMPORTED FROM ${source} (${timestamp}) ***`;
}

async function readRegularFile(filePath: string, status: ContextFileStatus): Promise<string | null> {
	if (status.state !== "present") {
		return null;
	}
	try {
		return await readFile(filePath, "utf8");
	} catch (error) {
		throw new IoError(`Failed to read ${filePath}`, error);
	}
}

/**
 * Merge the scope's CLAUDE.md and GEMINI.md into CONTEXT.md, move the originals to
 * `*.md.bak` and link both names to the merged file.
 */
export async function unifyContext(
	context: WorkingContext,
	scope: Scope,
	options: { now?: () => Date } = {},
): Promise<UnifyResult> {
	const { files, state } = await inspectScope(context, scope);
	const unifiedPath = files[UNIFIED_FILENAME].path;
	const result: UnifyResult = {
		scope,
		status: "unchanged",
		unifiedPath,
		sources: [],
		backups: [],
		symlinks: [],
	};

	for (const name of SOURCE_FILES) {
		const file = files[name];
		if (file.state === "symlink-other") {
			throw new ConflictError(
				`${name} is a symlink to ${file.symlinkTarget ?? "an unknown target"}, expected ${unifiedPath}. ` +
					"Resolve it by hand before unifying.",
			);
		}
	}
	if (state === "unified") {
		return result;
	}

	const sections: string[] = [];
	const timestamp = formatTimestamp((options.now ?? (() => new Date()))());
	for (const name of SOURCE_FILES) {
		const content = await readRegularFile(files[name].path, files[name]);
		if (content?.trim()) {
			result.sources.push(name);
			sections.push(`${importHeader(name, timestamp)}\n\n${content.trim()}`);
		}
	}
	if (sections.length === 0) {
		throw new NotFoundError(
			`Neither CLAUDE.md nor GEMINI.md has content in ${scope} scope. Nothing to unify.`,
		);
	}

	const existing = await readRegularFile(unifiedPath, files[UNIFIED_FILENAME]);
	const merged = existing?.trim() ? [existing.trim(), ...sections] : sections;
	await writeFileAtomic(unifiedPath, `${merged.join("\n\n")}\n`);

	for (const name of SOURCE_FILES) {
		const file = files[name];
		try {
			if (file.state === "present") {
				const backupPath = `${file.path}${BACKUP_SUFFIX}`;
				await rename(file.path, backupPath);
				result.backups.push(backupPath);
			}
			if (file.state !== "symlink-unified") {
				await mkdir(path.dirname(file.path), { recursive: true });
				await symlink(unifiedPath, file.path);
				result.symlinks.push(file.path);
			}
		} catch (error) {
			throw new IoError(`Failed to link ${file.path} to ${unifiedPath}`, error);
		}
	}

	result.status = "applied";
	return result;
}
