// TypeScript definitions for citation-js
declare module "@citation-js/core" {
	export interface CiteFormatOptions {
		format?: "text" | "html" | "object";
	}

	export class Cite {
		constructor(data?: unknown, options?: { forceType?: string });
		format(style: string, options?: CiteFormatOptions): string;
	}
}

declare module "@citation-js/plugin-bibtex" {
	// Registers the @bibtex plugin with @citation-js/core when imported
	export {};
}
