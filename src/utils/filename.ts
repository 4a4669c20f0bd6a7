import { getField } from "../models";
import { Reference } from "../types/interfaces";

export const AUTHOR_SEPARATOR = " and ";

export class FilenameGenerator {
	/**
	 * Last name of the first author: the `author` field is split on " and ",
	 * the first name is cut at its first comma. "Smith, J. and Doe, A." → "Smith".
	 *
	 * This is a literal-separator heuristic, not a name parser: "John Smith"
	 * yields "John Smith", and a last name containing " and " is cut short.
	 */
	static extractLastName(authorName: string): string {
		return authorName.split(AUTHOR_SEPARATOR)[0].split(",")[0].trim();
	}

	static firstAuthorLastName(reference: Reference): string {
		return this.extractLastName(getField(reference, "author") ?? "Unknown");
	}

	/**
	 * First three words of the title with everything but letters, digits and
	 * whitespace removed, joined by underscores.
	 */
	static shortTitle(title: string): string {
		return title
			.replace(/[^\p{L}\p{N}\s]/gu, "")
			.split(/\s+/)
			.filter((word) => word.length > 0)
			.slice(0, 3)
			.join("_");
	}

	/**
	 * Standardized archival filename `{LastName}_{Year}_{ShortTitle}.pdf`.
	 *
	 * @example
	 * // author "Doe, J.", year "2021", title "A Study of Things!!"
	 * FilenameGenerator.getStandardizedFilename(ref); // "Doe_2021_A_Study_of.pdf"
	 */
	static getStandardizedFilename(reference: Reference): string {
		const lastName = this.firstAuthorLastName(reference);
		const year = getField(reference, "year") ?? "XXXX";
		const title = getField(reference, "title") ?? "Untitled";

		return `${lastName}_${year}_${this.shortTitle(title)}.pdf`;
	}
}
