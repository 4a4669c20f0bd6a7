export class ReferenceManagerError extends Error {
	constructor(message: string, options?: { cause?: unknown }) {
		super(message, options);
		this.name = new.target.name;
	}
}

export interface ParseErrorContext {
	/** File path, or "<text>" for in-memory input */
	source: string;
	/** 0-based position of the failing entry among the @-entries */
	entryIndex?: number;
	/** Character offset of the failing entry */
	offset?: number;
	/** 1-based line of the failing entry */
	line?: number;
}

/**
 * Malformed BibTeX input. Raised before any project state changes.
 */
export class ParseError extends ReferenceManagerError {
	readonly source: string;
	readonly entryIndex?: number;
	readonly offset?: number;
	readonly line?: number;

	constructor(detail: string, context: ParseErrorContext, cause?: unknown) {
		super(`${describeLocation(context)}: ${detail}`, { cause });
		this.source = context.source;
		this.entryIndex = context.entryIndex;
		this.offset = context.offset;
		this.line = context.line;
	}
}

export class ValidationError extends ReferenceManagerError {}

export class IOError extends ReferenceManagerError {
	readonly path: string;

	constructor(message: string, path: string, cause?: unknown) {
		super(`${message}: ${path}${cause ? ` (${errorMessage(cause)})` : ""}`, {
			cause,
		});
		this.path = path;
	}
}

function describeLocation(context: ParseErrorContext): string {
	let location = `Failed to parse ${context.source}`;
	if (context.entryIndex !== undefined) {
		location += ` at entry ${context.entryIndex + 1}`;
	}
	if (context.line !== undefined) {
		location += ` (line ${context.line}, offset ${context.offset ?? 0})`;
	}
	return location;
}

export function errorMessage(error: unknown): string {
	return error instanceof Error ? error.message : String(error);
}
