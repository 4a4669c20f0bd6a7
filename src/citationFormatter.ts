import { BibTexManager } from "./bibtexManager";
import { getField } from "./models";
import {
	CITATION_STYLES,
	CitationStyle,
	KnownEntryType,
	Reference,
} from "./types/interfaces";
import { AUTHOR_SEPARATOR, FilenameGenerator } from "./utils/filename";
import { cleanLatex } from "./utils/latex";

interface CitationParts {
	reference: Reference;
	authors: string;
	year: string;
	title: string;
}

type CitationTemplate = (parts: CitationParts) => string;

function field(reference: Reference, name: string, fallback = ""): string {
	return getField(reference, name) ?? fallback;
}

const FULL_CITATION_TEMPLATES: Record<KnownEntryType, CitationTemplate> = {
	article: ({ reference, authors, year, title }) => {
		const journal = cleanLatex(field(reference, "journal", "Unknown Journal"));
		const number = field(reference, "number");
		const volumeInfo = field(reference, "volume") + (number ? `(${number})` : "");
		return `${authors}. (${year}). ${title}. ${journal}, ${volumeInfo}, ${field(reference, "pages")}.`;
	},
	book: ({ reference, authors, year, title }) => {
		const address = field(reference, "address");
		const location = address ? `${address}: ` : "";
		return `${authors}. (${year}). ${title}. ${location}${field(reference, "publisher", "Unknown Publisher")}.`;
	},
	inproceedings: (parts) => proceedingsCitation(parts),
	conference: (parts) => proceedingsCitation(parts),
	techreport: ({ reference, authors, year, title }) => {
		const number = field(reference, "number");
		const reportInfo = number ? `Technical Report ${number}` : "Technical Report";
		return `${authors}. (${year}). ${title}. ${reportInfo}, ${field(reference, "institution", "Unknown Institution")}.`;
	},
};

function proceedingsCitation({ reference, authors, year, title }: CitationParts): string {
	const booktitle = cleanLatex(field(reference, "booktitle", "Unknown Proceedings"));
	return `${authors}. (${year}). ${title}. In ${booktitle}, ${field(reference, "pages")}.`;
}

const defaultCitation: CitationTemplate = ({ authors, year, title }) =>
	`${authors}. (${year}). ${title}.`;

function isKnownEntryType(entryType: string): entryType is KnownEntryType {
	return Object.prototype.hasOwnProperty.call(FULL_CITATION_TEMPLATES, entryType);
}

export function isCitationStyle(style: string): style is CitationStyle {
	return CITATION_STYLES.some((known) => known === style);
}

/**
 * Formats references as LaTeX citation commands and human-readable text.
 * Nothing here throws: missing fields fall back to placeholder text.
 */
export class CitationFormatter {
	/**
	 * @example
	 * CitationFormatter.formatCitation(ref, "citep"); // "\\citep{smith2020}"
	 */
	static formatCitation(reference: Reference, style: string = "cite"): string {
		return this.formatMultipleCitations([reference], style);
	}

	/**
	 * One citation command for all keys, in the given order. Unknown styles
	 * fall back to `\cite`.
	 */
	static formatMultipleCitations(
		references: readonly Reference[],
		style: string = "cite"
	): string {
		const command: CitationStyle = isCitationStyle(style) ? style : "cite";
		const keys = references.map((ref) => ref.key).join(",");
		return `\\${command}{${keys}}`;
	}

	/** Raw BibTeX preview of a single reference */
	static formatBibtexEntry(reference: Reference): string {
		return BibTexManager.formatEntry(reference);
	}

	/**
	 * "Smith (2020)", "Smith and Doe (2020)" or "Smith et al. (2020)", counting
	 * authors by occurrences of " and ".
	 */
	static getFormattedAuthorYear(reference: Reference): string {
		const author = field(reference, "author", "Unknown");
		const year = field(reference, "year", "n.d.");
		const authors = author.split(AUTHOR_SEPARATOR);
		const lastName = FilenameGenerator.extractLastName(author);

		if (authors.length === 1) {
			return `${lastName} (${year})`;
		}
		if (authors.length === 2) {
			const secondLastName = FilenameGenerator.extractLastName(authors[1]);
			return `${lastName} and ${secondLastName} (${year})`;
		}
		return `${lastName} et al. (${year})`;
	}

	/**
	 * Full reference text; the template is picked by entry type
	 * (case-insensitive), with a generic author-year-title form for the rest.
	 */
	static getFullCitation(reference: Reference): string {
		const entryType = reference.entryType.toLowerCase();
		const parts: CitationParts = {
			reference,
			authors: cleanLatex(field(reference, "author", "Unknown")).split(AUTHOR_SEPARATOR).join(", "),
			year: field(reference, "year", "n.d."),
			title: cleanLatex(field(reference, "title", "Untitled")),
		};

		const template = isKnownEntryType(entryType)
			? FULL_CITATION_TEMPLATES[entryType]
			: defaultCitation;
		return template(parts);
	}
}
