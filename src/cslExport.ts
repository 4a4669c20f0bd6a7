import { Cite } from "@citation-js/core";
import "@citation-js/plugin-bibtex";
import { BibTexManager } from "./bibtexManager";
import { BibliographyFormat, Reference } from "./types/interfaces";

/**
 * CSL-JSON for the given references, converted by citation-js from their
 * BibTeX rendering.
 */
export function toCslJson(references: readonly Reference[]): string {
	if (references.length === 0) return "[]";

	const cite = new Cite(BibTexManager.serializeBibtex(references));
	return cite.format("data", { format: "text" });
}

export function formatBibliography(
	references: readonly Reference[],
	format: BibliographyFormat
): string {
	switch (format) {
		case "bibtex":
			return BibTexManager.serializeBibtex(references);
		case "csl-json":
			return toCslJson(references);
	}
}
