import { randomBytes } from "node:crypto";
import { mkdir, rename, rm, writeFile } from "node:fs/promises";
import path from "node:path";
import { IoError } from "../errors.js";

function buildTempPath(filePath: string): string {
	const suffix = `${process.pid}.${randomBytes(4).toString("hex")}`;
	return path.join(path.dirname(filePath), `.${path.basename(filePath)}.${suffix}.tmp`);
}

/**
 * Write through a sibling temp file and rename it over the target, so readers see
 * either the previous bytes or the new ones and never a truncated file.
 */
export async function writeFileAtomic(
	filePath: string,
	contents: string | Uint8Array,
): Promise<void> {
	const tempPath = buildTempPath(filePath);
	try {
		await mkdir(path.dirname(filePath), { recursive: true });
		await writeFile(tempPath, contents);
		await rename(tempPath, filePath);
	} catch (error) {
		await rm(tempPath, { force: true });
		throw new IoError(`Failed to write ${filePath}`, error);
	}
}
