// Unified types for the reference manager

/**
 * A single bibliography entry. Records are never mutated in place:
 * renaming, attaching a file or editing produces a new object.
 */
export interface Reference {
	readonly key: string;
	readonly entryType: string;
	readonly fields: Readonly<Record<string, string>>;
	/** Key held before duplicate resolution renamed this entry */
	readonly originalKey?: string;
	/** Location of the attached source document */
	readonly filePath?: string;
}

export const CITATION_STYLES = [
	"cite",
	"citep",
	"citet",
	"footcite",
	"textcite",
] as const;

export type CitationStyle = (typeof CITATION_STYLES)[number];

/** Entry types with a dedicated full-citation template */
export type KnownEntryType =
	| "article"
	| "book"
	| "inproceedings"
	| "conference"
	| "techreport";

export type BibliographyFormat = "bibtex" | "csl-json";

// Extension→format mapping for export format detection
export const BIBLIOGRAPHY_FORMAT_MAPPING: Record<string, BibliographyFormat> = {
	".bib": "bibtex",
	".bibtex": "bibtex",
	".json": "csl-json",
};

// Simple format→extension mapping
export const FORMAT_EXTENSION_MAPPING: Record<BibliographyFormat, string> = {
	bibtex: ".bib",
	"csl-json": ".json",
};

export interface ReferenceManagerSettings {
	baseDir: string;
	defaultCitationStyle: CitationStyle;
	bibliographyFilename: string;
	bibliographyFormat: BibliographyFormat;
	supportedFileTypes: string[];
}

/** Persistence collaborator for projects */
export interface ProjectStore {
	loadProject(name: string): Promise<ProjectData | null>;
	saveProject(project: ProjectData): Promise<void>;
	listProjects(): Promise<string[]>;
	deleteProject(name: string): Promise<boolean>;
	getProjectDir(name: string): Promise<string>;
}

/** File attachment collaborator */
export interface FileCopier {
	copyFile(sourcePath: string, destPath: string): Promise<void>;
}

/** Shape shared by the Project class and anything a store hands back */
export interface ProjectData {
	readonly name: string;
	readonly references: ReadonlyMap<string, Reference>;
}
