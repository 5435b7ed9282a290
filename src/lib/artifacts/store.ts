import { createHash } from "node:crypto";
import type { Dirent } from "node:fs";
import { readdir, readFile, rm, stat } from "node:fs/promises";
import path from "node:path";
import { errnoCode, InvalidNameError, IoError, NotFoundError } from "../errors.js";
import { writeFileAtomic } from "./atomic-write.js";

export const COMMAND_EXTENSION = ".toml";

const NAME_SEGMENT = /^[A-Za-z0-9_.-]+$/;
const MISSING_CODES = new Set(["ENOENT", "ENOTDIR"]);

export type ArtifactInfo =
	| { exists: false; hash: null; modifiedAt: null }
	| { exists: true; hash: string; modifiedAt: string };

function isValidSegment(segment: string): boolean {
	return NAME_SEGMENT.test(segment) && segment !== "." && segment !== "..";
}

export function isValidArtifactName(name: string): boolean {
	return name.length > 0 && name.split("/").every(isValidSegment);
}

export function assertArtifactName(name: string): void {
	if (!isValidArtifactName(name)) {
		throw new InvalidNameError(
			`Invalid artifact name "${name}". Use letters, digits, ".", "_", "-", and "/" between namespaces.`,
		);
	}
}

export function hashContent(content: Uint8Array): string {
	return createHash("md5").update(content).digest("hex");
}

/**
 * File-per-artifact storage rooted at one directory. Names map to
 * `<directory>/<name><extension>`; a `/` in the name is a namespace subdirectory.
 */
export class ArtifactStore {
	readonly directory: string;
	readonly extension: string;

	constructor(directory: string, extension: string = COMMAND_EXTENSION) {
		this.directory = directory;
		this.extension = extension;
	}

	pathFor(name: string): string {
		assertArtifactName(name);
		return `${path.join(this.directory, ...name.split("/"))}${this.extension}`;
	}

	async exists(name: string): Promise<boolean> {
		const filePath = this.pathFor(name);
		try {
			return (await stat(filePath)).isFile();
		} catch (error) {
			if (MISSING_CODES.has(errnoCode(error) ?? "")) {
				return false;
			}
			throw new IoError(`Failed to inspect ${filePath}`, error);
		}
	}

	async read(name: string): Promise<Buffer> {
		const content = await this.readOptional(name);
		if (!content) {
			throw new NotFoundError(`Artifact "${name}" not found in ${this.directory}.`);
		}
		return content;
	}

	async readOptional(name: string): Promise<Buffer | null> {
		const filePath = this.pathFor(name);
		try {
			return await readFile(filePath);
		} catch (error) {
			if (MISSING_CODES.has(errnoCode(error) ?? "")) {
				return null;
			}
			throw new IoError(`Failed to read ${filePath}`, error);
		}
	}

	async write(name: string, content: string | Uint8Array): Promise<string> {
		const filePath = this.pathFor(name);
		await writeFileAtomic(filePath, content);
		return filePath;
	}

	async remove(name: string): Promise<string> {
		const filePath = this.pathFor(name);
		if (!(await this.exists(name))) {
			throw new NotFoundError(`Artifact "${name}" not found in ${this.directory}.`);
		}
		try {
			await rm(filePath);
		} catch (error) {
			throw new IoError(`Failed to remove ${filePath}`, error);
		}
		return filePath;
	}

	async info(name: string): Promise<ArtifactInfo> {
		const content = await this.readOptional(name);
		if (!content) {
			return { exists: false, hash: null, modifiedAt: null };
		}
		const filePath = this.pathFor(name);
		let modifiedAt: string;
		try {
			modifiedAt = (await stat(filePath)).mtime.toISOString();
		} catch (error) {
			throw new IoError(`Failed to inspect ${filePath}`, error);
		}
		return { exists: true, hash: hashContent(content), modifiedAt };
	}

	async list(): Promise<string[]> {
		const names = await this.collectNames(this.directory, []);
		return names.sort();
	}

	private async collectNames(directory: string, prefix: string[]): Promise<string[]> {
		let entries: Dirent[];
		try {
			entries = await readdir(directory, { withFileTypes: true });
		} catch (error) {
			if (MISSING_CODES.has(errnoCode(error) ?? "")) {
				return [];
			}
			throw new IoError(`Failed to list ${directory}`, error);
		}

		const names: string[] = [];
		for (const entry of entries) {
			if (entry.isDirectory()) {
				if (isValidSegment(entry.name)) {
					names.push(
						...(await this.collectNames(path.join(directory, entry.name), [
							...prefix,
							entry.name,
						])),
					);
				}
				continue;
			}
			if (!entry.isFile() || !entry.name.endsWith(this.extension)) {
				continue;
			}
			const baseName = entry.name.slice(0, -this.extension.length);
			const name = [...prefix, baseName].join("/");
			if (isValidArtifactName(name)) {
				names.push(name);
			}
		}
		return names;
	}
}
