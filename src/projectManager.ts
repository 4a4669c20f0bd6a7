import { extname, join } from "path";
import { BibTexManager } from "./bibtexManager";
import { formatBibliography } from "./cslExport";
import { ValidationError } from "./errors";
import { Project, createReference } from "./models";
import {
	BIBLIOGRAPHY_FORMAT_MAPPING,
	BibliographyFormat,
	FORMAT_EXTENSION_MAPPING,
	FileCopier,
	ProjectStore,
	Reference,
	ReferenceManagerSettings,
} from "./types/interfaces";
import { DEFAULT_SETTINGS } from "./types/settings";
import { FilenameGenerator } from "./utils/filename";
import { readTextFile, writeTextFile } from "./utils/files";

/**
 * References from `incoming` that an import adds to a project already holding
 * `existing`. Existing references count as the first occurrences, so an
 * incoming entry whose key is taken comes back renamed (`key_1`, ...).
 *
 * Importing the same file twice therefore adds its entries again under
 * suffixed keys. A renamed key is not checked for further collisions: an
 * entry whose final key is already held, by the project or by an earlier
 * entry of the same import, is skipped with a warning.
 */
export function resolveImport(
	existing: readonly Reference[],
	incoming: readonly Reference[]
): Reference[] {
	const claimed = new Set(existing.map((ref) => ref.key));
	const added: Reference[] = [];

	for (const ref of BibTexManager.resolveDuplicateKeys([...existing, ...incoming]).slice(existing.length)) {
		if (claimed.has(ref.key)) {
			console.warn(`Skipping ${ref.originalKey ?? ref.key}: key '${ref.key}' is already taken`);
			continue;
		}
		claimed.add(ref.key);
		added.push(ref);
	}
	return added;
}

function validateProjectName(name: string): string {
	const trimmed = name.trim();
	if (!trimmed || /[\\/]/.test(trimmed) || trimmed === "." || trimmed === "..") {
		throw new ValidationError(`Invalid project name: "${name}"`);
	}
	return trimmed;
}

/**
 * Manages research projects and their references. One project is active at
 * a time; every reference operation works on it.
 */
export class ProjectManager {
	activeProject: Project | null = null;

	constructor(
		private readonly store: ProjectStore,
		private readonly files: FileCopier,
		private readonly settings: ReferenceManagerSettings = DEFAULT_SETTINGS
	) {}

	private requireActiveProject(action: string): Project {
		if (!this.activeProject) {
			throw new ValidationError(`No active project to ${action}`);
		}
		return this.activeProject;
	}

	async createProject(name: string): Promise<Project> {
		const projectName = validateProjectName(name);
		if ((await this.store.listProjects()).includes(projectName)) {
			throw new ValidationError(`Project already exists: ${projectName}`);
		}

		const project = new Project(projectName);
		await this.store.saveProject(project);
		this.activeProject = project;
		console.log(`Created project ${projectName}`);
		return project;
	}

	/**
	 * Load a project and make it active.
	 * @returns null (active project unchanged) when it doesn't exist
	 */
	async loadProject(name: string): Promise<Project | null> {
		const data = await this.store.loadProject(name);
		if (!data) return null;

		this.activeProject = Project.from(data);
		return this.activeProject;
	}

	/** Load a project, failing when it doesn't exist */
	async openProject(name: string): Promise<Project> {
		const project = await this.loadProject(name);
		if (!project) {
			throw new ValidationError(`Project not found: ${name}`);
		}
		return project;
	}

	async saveProject(): Promise<void> {
		await this.store.saveProject(this.requireActiveProject("save"));
	}

	listProjects(): Promise<string[]> {
		return this.store.listProjects();
	}

	async deleteProject(name: string): Promise<boolean> {
		if (this.activeProject?.name === name) {
			this.activeProject = null;
		}
		return this.store.deleteProject(name);
	}

	/**
	 * Import a BibTeX file into the active project.
	 * @returns the references that were added, under their final keys
	 */
	async importBibtex(filePath: string): Promise<Reference[]> {
		const text = await readTextFile(filePath);
		return this.importBibtexText(text, filePath);
	}

	/**
	 * Import BibTeX text into the active project. Either every new reference
	 * is added and saved, or the project is left as it was.
	 */
	async importBibtexText(text: string, source?: string): Promise<Reference[]> {
		const project = this.requireActiveProject("import into");
		const parsed = BibTexManager.parseBibtex(text, source);

		const newReferences = resolveImport(project.getAllReferences(), parsed);
		for (const ref of newReferences) {
			project.addReference(ref);
		}

		try {
			await this.store.saveProject(project);
		} catch (error) {
			for (const ref of newReferences) {
				project.removeReference(ref.key);
			}
			console.error(`Import into ${project.name} rolled back:`, error);
			throw error;
		}

		const renamed = newReferences.filter((ref) => ref.originalKey !== undefined);
		console.log(
			`Imported ${newReferences.length} of ${parsed.length} references into ${project.name}` +
				(renamed.length > 0 ? ` (${renamed.length} renamed)` : "")
		);
		return newReferences;
	}

	/**
	 * `<project dir>/<bibliographyFilename><ext>`, the extension following
	 * the format (or the configured one).
	 */
	async getDefaultBibliographyPath(format?: BibliographyFormat): Promise<string> {
		const project = this.requireActiveProject("export from");
		const extension = FORMAT_EXTENSION_MAPPING[format ?? this.settings.bibliographyFormat];
		return join(
			await this.store.getProjectDir(project.name),
			`${this.settings.bibliographyFilename}${extension}`
		);
	}

	/**
	 * Export the active project. The format comes from the argument, then
	 * from the file extension, then from settings.
	 * @returns the format that was written
	 */
	async exportBibliography(
		filePath: string,
		format?: BibliographyFormat
	): Promise<BibliographyFormat> {
		const project = this.requireActiveProject("export from");

		let bibFormat = format ?? this.settings.bibliographyFormat;
		const ext = extname(filePath).toLowerCase();
		if (!format && ext) {
			const detectedFormat = BIBLIOGRAPHY_FORMAT_MAPPING[ext];
			if (!detectedFormat) {
				throw new ValidationError(
					`Unsupported file extension: ${ext}. Supported extensions: ${Object.keys(BIBLIOGRAPHY_FORMAT_MAPPING).join(", ")}`
				);
			}
			bibFormat = detectedFormat;
		}

		await writeTextFile(filePath, formatBibliography(project.getAllReferences(), bibFormat));
		console.log(`Exported ${project.size} references from ${project.name} to ${filePath} (${bibFormat})`);
		return bibFormat;
	}

	/** Manually add a reference; its key must not be taken */
	async addReference(reference: Reference): Promise<void> {
		const project = this.requireActiveProject("add to");
		if (project.hasReference(reference.key)) {
			throw new ValidationError(`Reference with key '${reference.key}' already exists`);
		}

		project.addReference(reference);
		try {
			await this.store.saveProject(project);
		} catch (error) {
			project.removeReference(reference.key);
			throw error;
		}
	}

	async removeReference(key: string): Promise<Reference> {
		const reference = this.getReference(key);
		const project = this.requireActiveProject("remove from");

		project.removeReference(key);
		try {
			await this.store.saveProject(project);
		} catch (error) {
			project.addReference(reference);
			throw error;
		}
		return reference;
	}

	getReference(key: string): Reference {
		const reference = this.requireActiveProject("look up").getReference(key);
		if (!reference) {
			throw new ValidationError(`Reference with key '${key}' not found`);
		}
		return reference;
	}

	/**
	 * Copy a source document into the project directory under its
	 * standardized filename and record the location on the reference.
	 */
	async addReferenceFile(referenceKey: string, filePath: string): Promise<Reference> {
		const project = this.requireActiveProject("attach to");
		const reference = this.getReference(referenceKey);

		const ext = extname(filePath).slice(1).toLowerCase();
		if (!this.settings.supportedFileTypes.includes(ext)) {
			console.warn(
				`Attaching ${filePath}: .${ext} is not one of ${this.settings.supportedFileTypes.join(", ")}`
			);
		}

		const projectDir = await this.store.getProjectDir(project.name);
		const destPath = join(projectDir, FilenameGenerator.getStandardizedFilename(reference));
		await this.files.copyFile(filePath, destPath);

		const updated = createReference(reference.key, reference.entryType, reference.fields, {
			originalKey: reference.originalKey,
			filePath: destPath,
		});
		project.addReference(updated);
		try {
			await this.store.saveProject(project);
		} catch (error) {
			project.addReference(reference);
			throw error;
		}
		return updated;
	}
}
