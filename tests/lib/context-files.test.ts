import { lstat, mkdir, readFile, readlink, symlink, writeFile } from "node:fs/promises";
import path from "node:path";
import {
	formatTimestamp,
	getContextStatus,
	importHeader,
	unifyContext,
} from "../../src/lib/context-files.js";
import { ConflictError, NotFoundError } from "../../src/lib/errors.js";
import { createTestContext, withTempDir } from "../helpers/context.js";

const fixedNow = () => new Date(2024, 4, 6, 7, 8, 9);

async function writeText(filePath: string, contents: string): Promise<void> {
	await mkdir(path.dirname(filePath), { recursive: true });
	await writeFile(filePath, contents, "utf8");
}

describe("context files", () => {
	it("formats timestamps and headers", () => {
		expect(formatTimestamp(fixedNow())).toBe("2024-05-06 07:08:09");
		expect(importHeader("CLAUDE.md", "2024-05-06 07:08:09")).toBe(
			"*** CONTEXT IMPORTED FROM CLAUDE.md (2024-05-06 07:08:09) ***",
		);
	});

	it("reports every scope as not unified when nothing exists", async () => {
		await withTempDir(async (root) => {
			const statuses = await getContextStatus(createTestContext(root));

			expect(statuses.map((status) => [status.scope, status.state])).toEqual([
				["project", "not-unified"],
				["user", "not-unified"],
			]);
			expect(statuses[1].files["GEMINI.md"]).toEqual({
				path: path.join(root, "home", ".gemini", "GEMINI.md"),
				state: "missing",
				symlinkTarget: null,
			});
		});
	});

	it("merges both sources, backs them up, and links them to CONTEXT.md", async () => {
		await withTempDir(async (root) => {
			const context = createTestContext(root);
			const claude = path.join(root, "home", ".claude", "CLAUDE.md");
			const gemini = path.join(root, "home", ".gemini", "GEMINI.md");
			const unified = path.join(root, "home", ".config", "ai-common", "CONTEXT.md");
			await writeText(claude, "Use tabs.\n");
			await writeText(gemini, "\nPrefer small commits.\n");

			const result = await unifyContext(context, "user", { now: fixedNow });

			expect(result).toEqual({
				scope: "user",
				status: "applied",
				unifiedPath: unified,
				sources: ["CLAUDE.md", "GEMINI.md"],
				backups: [`${claude}.bak`, `${gemini}.bak`],
				symlinks: [claude, gemini],
			});
			expect(await readFile(unified, "utf8")).toBe(
				"*** CONTEXT IMPORTED FROM CLAUDE.md (2024-05-06 07:08:09) ***\n\nUse tabs.\n\n" +
					"*** CONTEXT IMPORTED FROM GEMINI.md (2024-05-06 07:08:09) ***\n\nPrefer small commits.\n",
			);
			expect(await readFile(`${claude}.bak`, "utf8")).toBe("Use tabs.\n");
			expect((await lstat(gemini)).isSymbolicLink()).toBe(true);
			expect(await readlink(gemini)).toBe(unified);

			const [status] = await getContextStatus(context, "user");
			expect(status.state).toBe("unified");
			expect(status.files["CLAUDE.md"].state).toBe("symlink-unified");
		});
	});

	it("appends to an existing CONTEXT.md and links a missing source", async () => {
		await withTempDir(async (root) => {
			const context = createTestContext(root);
			const unified = path.join(root, "project", ".config", "ai-common", "CONTEXT.md");
			const gemini = path.join(root, "project", ".gemini", "GEMINI.md");
			const claude = path.join(root, "project", ".claude", "CLAUDE.md");
			await writeText(unified, "Existing notes.\n\n");
			await writeText(gemini, "Project rules.");

			const result = await unifyContext(context, "project", { now: fixedNow });

			expect(result.sources).toEqual(["GEMINI.md"]);
			expect(result.backups).toEqual([`${gemini}.bak`]);
			expect(result.symlinks).toEqual([claude, gemini]);
			expect(await readFile(unified, "utf8")).toBe(
				"Existing notes.\n\n*** CONTEXT IMPORTED FROM GEMINI.md (2024-05-06 07:08:09) ***\n\nProject rules.\n",
			);
		});
	});

	it("is a no-op when already unified", async () => {
		await withTempDir(async (root) => {
			const context = createTestContext(root);
			await writeText(path.join(root, "home", ".claude", "CLAUDE.md"), "a");
			await unifyContext(context, "user", { now: fixedNow });

			const again = await unifyContext(context, "user", { now: fixedNow });

			expect(again.status).toBe("unchanged");
			expect(again.sources).toEqual([]);
		});
	});

	it("refuses to touch a source linked elsewhere", async () => {
		await withTempDir(async (root) => {
			const context = createTestContext(root);
			const elsewhere = path.join(root, "elsewhere.md");
			const claude = path.join(root, "home", ".claude", "CLAUDE.md");
			await writeText(elsewhere, "x");
			await mkdir(path.dirname(claude), { recursive: true });
			await symlink(elsewhere, claude);

			const [status] = await getContextStatus(context, "user");
			expect(status.files["CLAUDE.md"]).toEqual({
				path: claude,
				state: "symlink-other",
				symlinkTarget: elsewhere,
			});
			await expect(unifyContext(context, "user")).rejects.toBeInstanceOf(ConflictError);
		});
	});

	it("fails when there is nothing to unify", async () => {
		await withTempDir(async (root) => {
			await expect(unifyContext(createTestContext(root), "user")).rejects.toBeInstanceOf(
				NotFoundError,
			);
		});
	});
});
