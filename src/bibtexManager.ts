import { BibtexEntry, toJSON } from "bibtex-parse-js";
import { ParseError, errorMessage } from "./errors";
import { createReference } from "./models";
import { Reference } from "./types/interfaces";
import { readTextFile, writeTextFile } from "./utils/files";

const TEXT_SOURCE = "<text>";

// Blocks that carry no bibliographic record
const NON_RECORD_TYPES = new Set(["comment", "preamble", "string"]);

interface EntryStart {
	/** Entry type as written */
	name: string;
	/** Lowercased entry type */
	type: string;
	offset: number;
	line: number;
	/** Index of the opening `{` or `(` */
	open: number;
}

function findEntryStarts(text: string): EntryStart[] {
	const starts: EntryStart[] = [];
	for (const match of text.matchAll(/@\s*([A-Za-z]+)\s*[{(]/g)) {
		const offset = match.index ?? 0;
		starts.push({
			name: match[1],
			type: match[1].toLowerCase(),
			offset,
			line: text.slice(0, offset).split("\n").length,
			open: offset + match[0].length - 1,
		});
	}
	return starts;
}

function isRecordStart(start: EntryStart): boolean {
	return !NON_RECORD_TYPES.has(start.type);
}

/**
 * Index of the delimiter closing the entry opened at `open`, or -1.
 * Parentheses inside braces or quoted values don't close an entry.
 */
function findClosingDelimiter(text: string, open: number): number {
	const parenthesised = text[open] === "(";
	let depth = 0;
	let quoted = false;

	for (let i = open + 1; i < text.length; i++) {
		const char = text[i];
		if (char === "\\") {
			i++;
		} else if (char === "{") {
			depth++;
		} else if (char === "}") {
			if (depth === 0) return parenthesised ? -1 : i;
			depth--;
		} else if (parenthesised && depth === 0) {
			if (char === '"') quoted = !quoted;
			else if (char === ")" && !quoted) return i;
		}
	}
	return -1;
}

interface NormalizedBibtex {
	text: string;
	/** Starts that aren't inside another entry */
	starts: EntryStart[];
	/** Citation keys of field-less entries, by entry offset */
	emptyEntries: Map<number, string>;
}

/**
 * Rewrite the input into the subset bibtex-parse-js reads, keeping every
 * offset: `@type( ... )` becomes `@type{ ... }`, and entries with no fields
 * (`@misc{k}`, `@misc{k,}`) are blanked out and returned separately.
 */
function normalizeEntries(text: string, starts: readonly EntryStart[]): NormalizedBibtex {
	const chars = text.split("");
	const emptyEntries = new Map<number, string>();
	const topLevel: EntryStart[] = [];
	let coveredUntil = 0;

	for (const start of starts) {
		if (start.offset < coveredUntil) continue;
		topLevel.push(start);

		const close = findClosingDelimiter(text, start.open);
		if (close < 0) continue;
		coveredUntil = close + 1;

		chars[start.open] = "{";
		chars[close] = "}";

		const keyOnly = /^\s*([^\s,{}()]+)\s*,?\s*$/.exec(text.slice(start.open + 1, close));
		if (keyOnly && isRecordStart(start)) {
			emptyEntries.set(start.offset, keyOnly[1]);
			chars.fill(" ", start.offset, close + 1);
		}
	}

	return { text: chars.join(""), starts: topLevel, emptyEntries };
}

function isRecord(entry: BibtexEntry): boolean {
	return (
		entry.entryTags !== undefined ||
		!NON_RECORD_TYPES.has(entry.entryType.toLowerCase())
	);
}

/**
 * BibTeX import/export: text ↔ Reference records, duplicate key detection
 * and resolution, file merging.
 */
export class BibTexManager {
	/**
	 * Parse BibTeX source into references, one per entry, in source order.
	 * Field values are kept verbatim (no LaTeX resolution).
	 *
	 * @throws ParseError when any entry is malformed; nothing is returned for
	 * the other entries.
	 */
	static parseBibtex(text: string, source: string = TEXT_SOURCE): Reference[] {
		const normalized = normalizeEntries(text, findEntryStarts(text));

		let entries: BibtexEntry[];
		try {
			entries = toJSON(normalized.text);
		} catch (error) {
			throw this.locateParseError(normalized.text, normalized.starts, source, error);
		}

		// Field-less entries were taken out before parsing; put them back in
		// source order
		const parsed = entries.filter(isRecord);
		const ordered: Array<{ entry: BibtexEntry; start?: EntryStart }> = [];
		for (const start of normalized.starts.filter(isRecordStart)) {
			const emptyKey = normalized.emptyEntries.get(start.offset);
			if (emptyKey !== undefined) {
				ordered.push({
					entry: { citationKey: emptyKey, entryType: start.name, entryTags: {} },
					start,
				});
				continue;
			}
			const entry = parsed.shift();
			if (entry) ordered.push({ entry, start });
		}
		ordered.push(...parsed.map((entry) => ({ entry })));

		return ordered.map(({ entry, start }, index) => {
			const key = entry.citationKey?.trim() ?? "";
			const entryType = entry.entryType.trim();

			if (!key || !entryType) {
				throw new ParseError(
					key ? "entry has no type" : "entry has no citation key",
					{
						source,
						entryIndex: index,
						offset: start?.offset,
						line: start?.line,
					}
				);
			}

			return createReference(key, entryType, entry.entryTags ?? {});
		});
	}

	static async parseBibtexFile(filePath: string): Promise<Reference[]> {
		const text = await readTextFile(filePath);
		return this.parseBibtex(text, filePath);
	}

	/**
	 * Pin a parser failure to the first entry that fails on its own.
	 */
	private static locateParseError(
		text: string,
		starts: readonly EntryStart[],
		source: string,
		cause: unknown
	): ParseError {
		const detail = errorMessage(cause);

		for (let i = 0; i < starts.length; i++) {
			const end = i + 1 < starts.length ? starts[i + 1].offset : text.length;
			try {
				toJSON(text.slice(starts[i].offset, end));
			} catch {
				return new ParseError(
					detail,
					{
						source,
						entryIndex: i,
						offset: starts[i].offset,
						line: starts[i].line,
					},
					cause
				);
			}
		}

		return new ParseError(detail, { source }, cause);
	}

	/**
	 * Render one reference as a BibTeX entry block. The entry type is kept as
	 * stored, fields are written in insertion order.
	 */
	static formatEntry(reference: Reference): string {
		let entry = `@${reference.entryType}{${reference.key},\n`;

		for (const [field, value] of Object.entries(reference.fields)) {
			entry += `  ${field} = {${value}},\n`;
		}

		return entry + "}";
	}

	static serializeBibtex(references: readonly Reference[]): string {
		if (references.length === 0) return "";
		return references.map((ref) => this.formatEntry(ref)).join("\n\n") + "\n";
	}

	static async writeBibtexFile(
		references: readonly Reference[],
		filePath: string
	): Promise<void> {
		await writeTextFile(filePath, this.serializeBibtex(references));
		console.log(`Wrote ${references.length} entries to ${filePath}`);
	}

	/**
	 * Group references by key.
	 * @returns only the keys shared by two or more references
	 */
	static findDuplicateKeys(
		references: readonly Reference[]
	): Map<string, Reference[]> {
		const keyMap = new Map<string, Reference[]>();

		for (const ref of references) {
			const group = keyMap.get(ref.key);
			if (group) {
				group.push(ref);
			} else {
				keyMap.set(ref.key, [ref]);
			}
		}

		for (const [key, group] of keyMap) {
			if (group.length < 2) keyMap.delete(key);
		}
		return keyMap;
	}

	/**
	 * Rename later occurrences of a duplicated key: the first keeps its key,
	 * the i-th repeat becomes `{key}_{i}` with `originalKey` set to `key`.
	 * Returns a new list; the input records are left untouched.
	 */
	static resolveDuplicateKeys(references: readonly Reference[]): Reference[] {
		const duplicates = this.findDuplicateKeys(references);
		if (duplicates.size === 0) return [...references];

		const seen = new Map<string, number>();
		const resolved = references.map((ref) => {
			if (!duplicates.has(ref.key)) return ref;

			const occurrence = seen.get(ref.key) ?? 0;
			seen.set(ref.key, occurrence + 1);
			if (occurrence === 0) return ref;

			return createReference(`${ref.key}_${occurrence}`, ref.entryType, ref.fields, {
				originalKey: ref.key,
				filePath: ref.filePath,
			});
		});

		console.warn(
			`Renamed duplicate citekeys: ${Array.from(duplicates)
				.map(([key, group]) => `${key} (${group.length} instances)`)
				.join(", ")}`
		);
		return resolved;
	}

	/**
	 * Merge BibTeX files in the listed order, resolving duplicate keys, and
	 * write the result. Every source is parsed before anything is written.
	 */
	static async mergeBibtexFiles(
		filePaths: readonly string[],
		outputPath: string
	): Promise<Reference[]> {
		const allReferences: Reference[] = [];

		for (const filePath of filePaths) {
			allReferences.push(...(await this.parseBibtexFile(filePath)));
		}

		const resolved = this.resolveDuplicateKeys(allReferences);
		await this.writeBibtexFile(resolved, outputPath);
		return resolved;
	}
}
