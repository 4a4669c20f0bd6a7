// TypeScript definitions for bibtex-parse-js (the package ships none)
declare module "bibtex-parse-js" {
	export interface BibtexEntry {
		citationKey?: string;
		entryType: string;
		entryTags?: Record<string, string>;
		/** Raw body of @comment and @preamble blocks */
		entry?: string;
	}

	export function toJSON(bibtex: string): BibtexEntry[];
}
