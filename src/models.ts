import { ProjectData, Reference } from "./types/interfaces";

export function createReference(
	key: string,
	entryType: string,
	fields: Record<string, string>,
	extra: { originalKey?: string; filePath?: string } = {}
): Reference {
	const reference: Reference = {
		key,
		entryType,
		fields: Object.freeze({ ...fields }),
		...(extra.originalKey !== undefined ? { originalKey: extra.originalKey } : {}),
		...(extra.filePath !== undefined ? { filePath: extra.filePath } : {}),
	};
	return Object.freeze(reference);
}

/**
 * Look up a field by exact name, falling back to a case-insensitive match
 * (BibTeX field names are case-insensitive).
 */
export function getField(reference: Reference, name: string): string | undefined {
	const exact = reference.fields[name];
	if (exact !== undefined) return exact;

	const lower = name.toLowerCase();
	for (const [field, value] of Object.entries(reference.fields)) {
		if (field.toLowerCase() === lower) return value;
	}
	return undefined;
}

/**
 * A research project with its own set of references, keyed by citation key.
 */
export class Project implements ProjectData {
	readonly name: string;
	private readonly entries = new Map<string, Reference>();

	constructor(name: string, references: Iterable<Reference> = []) {
		this.name = name;
		for (const reference of references) {
			this.addReference(reference);
		}
	}

	get references(): ReadonlyMap<string, Reference> {
		return this.entries;
	}

	get size(): number {
		return this.entries.size;
	}

	/** Insert or replace the reference stored under its key */
	addReference(reference: Reference): void {
		this.entries.set(reference.key, reference);
	}

	removeReference(key: string): boolean {
		return this.entries.delete(key);
	}

	getReference(key: string): Reference | undefined {
		return this.entries.get(key);
	}

	hasReference(key: string): boolean {
		return this.entries.has(key);
	}

	getAllReferences(): Reference[] {
		return Array.from(this.entries.values());
	}

	static from(data: ProjectData): Project {
		return data instanceof Project
			? data
			: new Project(data.name, data.references.values());
	}
}
