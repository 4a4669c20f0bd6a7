import { access, mkdir, readFile, writeFile } from "fs/promises";
import { dirname } from "path";
import { IOError } from "../errors";

export async function readTextFile(filePath: string): Promise<string> {
	let text: string;
	try {
		text = await readFile(filePath, "utf8");
	} catch (error) {
		throw new IOError("Failed to read file", filePath, error);
	}
	// BOM
	return text.charCodeAt(0) === 0xfeff ? text.slice(1) : text;
}

/**
 * Write UTF-8 text, creating the parent directory if it doesn't exist.
 */
export async function writeTextFile(
	filePath: string,
	content: string
): Promise<void> {
	try {
		await mkdir(dirname(filePath), { recursive: true });
		await writeFile(filePath, content, "utf8");
	} catch (error) {
		throw new IOError("Failed to write file", filePath, error);
	}
}

export async function fileExists(filePath: string): Promise<boolean> {
	try {
		await access(filePath);
		return true;
	} catch (error) {
		if (isNotFound(error)) return false;
		throw new IOError("Failed to access file", filePath, error);
	}
}

export function isNotFound(error: unknown): boolean {
	return (
		error instanceof Error &&
		"code" in error &&
		error.code === "ENOENT"
	);
}
