import { BibTexManager } from "./bibtexManager";
import { CitationFormatter } from "./citationFormatter";
import { ValidationError } from "./errors";
import type ReferenceManagerApp from "./main";
import { BibliographyFormat } from "./types/interfaces";
import { FilenameGenerator } from "./utils/filename";

export interface CommandOptions {
	style?: string;
	format?: BibliographyFormat;
	/** Settings file the app was loaded from */
	config?: string;
}

export interface Command {
	id: string;
	name: string;
	/** Arguments after the command id */
	usage: string;
	/** Fewest positional arguments the command takes */
	minArgs: number;
	run(
		app: ReferenceManagerApp,
		args: string[],
		options: CommandOptions,
		notify: (message: string) => void
	): Promise<void>;
}

// Command definitions
export function getReferenceCommands(): Command[] {
	return [
		{
			id: "init-config",
			name: "Write the effective settings to the config file",
			usage: "",
			minArgs: 0,
			run: async (app, _args, options, notify) => {
				const configPath = await app.saveSettings(options.config);
				notify(`Settings written to ${configPath}`);
			},
		},
		{
			id: "create-project",
			name: "Create a new project",
			usage: "<name>",
			minArgs: 1,
			run: async (app, [name], _options, notify) => {
				const project = await app.projectManager.createProject(name);
				notify(`Created project ${project.name}`);
			},
		},
		{
			id: "list-projects",
			name: "List projects",
			usage: "",
			minArgs: 0,
			run: async (app, _args, _options, notify) => {
				const projects = await app.projectManager.listProjects();
				projects.forEach((name) => notify(name));
			},
		},
		{
			id: "delete-project",
			name: "Delete a project and its files",
			usage: "<name>",
			minArgs: 1,
			run: async (app, [name], _options, notify) => {
				if (!(await app.projectManager.deleteProject(name))) {
					throw new ValidationError(`Project not found: ${name}`);
				}
				notify(`Deleted project ${name}`);
			},
		},
		{
			id: "import",
			name: "Import a BibTeX file into a project",
			usage: "<project> <file.bib>",
			minArgs: 2,
			run: async (app, [project, file], _options, notify) => {
				await app.projectManager.openProject(project);
				const added = await app.projectManager.importBibtex(file);
				notify(`Imported ${added.length} references into ${project}`);
				added
					.filter((ref) => ref.originalKey !== undefined)
					.forEach((ref) => notify(`  ${ref.originalKey} -> ${ref.key}`));
			},
		},
		{
			id: "export",
			name: "Export a project's references",
			usage: "<project> [output] [--format bibtex|csl-json]",
			minArgs: 1,
			run: async (app, [project, output], options, notify) => {
				await app.projectManager.openProject(project);
				const filePath = output ?? (await app.projectManager.getDefaultBibliographyPath(options.format));
				const format = await app.projectManager.exportBibliography(filePath, options.format);
				notify(`Bibliography exported to ${filePath} (${format})`);
			},
		},
		{
			id: "merge",
			name: "Merge BibTeX files, renaming duplicate keys",
			usage: "<output.bib> <input.bib>...",
			minArgs: 2,
			run: async (_app, [output, ...inputs], _options, notify) => {
				const merged = await BibTexManager.mergeBibtexFiles(inputs, output);
				notify(`Merged ${inputs.length} files (${merged.length} entries) into ${output}`);
			},
		},
		{
			id: "attach",
			name: "Attach a source document to a reference",
			usage: "<project> <key> <file>",
			minArgs: 3,
			run: async (app, [project, key, file], _options, notify) => {
				await app.projectManager.openProject(project);
				const reference = await app.projectManager.addReferenceFile(key, file);
				notify(`Attached ${file} as ${reference.filePath}`);
			},
		},
		{
			id: "remove",
			name: "Remove a reference from a project",
			usage: "<project> <key>",
			minArgs: 2,
			run: async (app, [project, key], _options, notify) => {
				await app.projectManager.openProject(project);
				await app.projectManager.removeReference(key);
				notify(`Removed ${key} from ${project}`);
			},
		},
		{
			id: "cite",
			name: "Print a LaTeX citation command",
			usage: "<project> <key>... [--style cite|citep|citet|footcite|textcite]",
			minArgs: 2,
			run: async (app, [project, ...keys], options, notify) => {
				await app.projectManager.openProject(project);
				const references = keys.map((key) => app.projectManager.getReference(key));
				notify(
					CitationFormatter.formatMultipleCitations(
						references,
						options.style ?? app.settings.defaultCitationStyle
					)
				);
			},
		},
		{
			id: "show",
			name: "Show a reference",
			usage: "<project> <key>",
			minArgs: 2,
			run: async (app, [project, key], _options, notify) => {
				await app.projectManager.openProject(project);
				const reference = app.projectManager.getReference(key);
				notify(CitationFormatter.getFullCitation(reference));
				notify(CitationFormatter.getFormattedAuthorYear(reference));
				notify(`File: ${reference.filePath ?? FilenameGenerator.getStandardizedFilename(reference) + " (not attached)"}`);
				notify(CitationFormatter.formatBibtexEntry(reference));
			},
		},
	];
}

export function findCommand(id: string): Command | undefined {
	return getReferenceCommands().find((command) => command.id === id);
}

export async function runCommand(
	app: ReferenceManagerApp,
	id: string,
	args: string[],
	options: CommandOptions,
	notify: (message: string) => void
): Promise<void> {
	const command = findCommand(id);
	if (!command) {
		throw new ValidationError(`Unknown command: ${id}`);
	}
	if (args.length < command.minArgs) {
		throw new ValidationError(`Usage: refman ${command.id} ${command.usage}`);
	}
	await command.run(app, args, options, notify);
}
