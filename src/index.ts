export { BibTexManager } from "./bibtexManager";
export { CitationFormatter, isCitationStyle } from "./citationFormatter";
export { formatBibliography, toCslJson } from "./cslExport";
export {
	IOError,
	ParseError,
	ReferenceManagerError,
	ValidationError,
} from "./errors";
export { FileManager } from "./fileManager";
export { default as ReferenceManagerApp, loadSettings } from "./main";
export { Project, createReference, getField } from "./models";
export { ProjectManager, resolveImport } from "./projectManager";
export { getReferenceCommands, runCommand } from "./setup";
export * from "./types/interfaces";
export { DEFAULT_SETTINGS } from "./types/settings";
export { FilenameGenerator } from "./utils/filename";
export { cleanLatex } from "./utils/latex";
