import { copyFile, mkdir, readdir, rm } from "fs/promises";
import { join } from "path";
import { z } from "zod";
import { IOError } from "./errors";
import { Project, createReference } from "./models";
import {
	FileCopier,
	ProjectData,
	ProjectStore,
	Reference,
} from "./types/interfaces";
import { fileExists, readTextFile, writeTextFile } from "./utils/files";

const PROJECT_FILE = "project.json";
const PROJECTS_LIST_FILE = "projects.json";

const referenceSchema = z.object({
	key: z.string(),
	entryType: z.string(),
	fields: z.record(z.string()),
	originalKey: z.string().optional(),
	filePath: z.string().optional(),
});

const projectFileSchema = z.object({
	name: z.string(),
	references: z.record(referenceSchema),
});

const projectsListSchema = z.object({
	projects: z.array(z.string()),
});

type ReferenceRecord = z.infer<typeof referenceSchema>;

function toRecord(reference: Reference): ReferenceRecord {
	return {
		key: reference.key,
		entryType: reference.entryType,
		fields: { ...reference.fields },
		originalKey: reference.originalKey,
		filePath: reference.filePath,
	};
}

function parseJson<T>(
	text: string,
	schema: z.ZodType<T, z.ZodTypeDef, unknown>,
	filePath: string
): T {
	let data: unknown;
	try {
		data = JSON.parse(text);
	} catch (error) {
		throw new IOError("Invalid JSON", filePath, error);
	}

	const result = schema.safeParse(data);
	if (!result.success) {
		throw new IOError("Unexpected file contents", filePath, result.error);
	}
	return result.data;
}

/**
 * On-disk project store: one directory per project holding `project.json`,
 * plus a `projects.json` index in the base directory.
 */
export class FileManager implements ProjectStore, FileCopier {
	readonly baseDir: string;
	private readonly projectsFile: string;

	constructor(baseDir: string = "references") {
		this.baseDir = baseDir;
		this.projectsFile = join(baseDir, PROJECTS_LIST_FILE);
	}

	async ensureBaseDir(): Promise<void> {
		try {
			await mkdir(this.baseDir, { recursive: true });
		} catch (error) {
			throw new IOError("Failed to create directory", this.baseDir, error);
		}
	}

	/** Directory of a project, created if it doesn't exist */
	async getProjectDir(projectName: string): Promise<string> {
		const projectDir = join(this.baseDir, projectName);
		try {
			await mkdir(projectDir, { recursive: true });
		} catch (error) {
			throw new IOError("Failed to create directory", projectDir, error);
		}
		return projectDir;
	}

	async saveProject(project: ProjectData): Promise<void> {
		const projectDir = await this.getProjectDir(project.name);
		const references: Record<string, ReferenceRecord> = {};
		for (const [key, reference] of project.references) {
			references[key] = toRecord(reference);
		}

		await writeTextFile(
			join(projectDir, PROJECT_FILE),
			JSON.stringify({ name: project.name, references }, null, 2)
		);

		await this.updateProjectsList();
	}

	async loadProject(projectName: string): Promise<Project | null> {
		const projectFile = join(this.baseDir, projectName, PROJECT_FILE);
		if (!(await fileExists(projectFile))) {
			return null;
		}

		const data = parseJson(await readTextFile(projectFile), projectFileSchema, projectFile);

		const project = new Project(data.name);
		for (const [key, ref] of Object.entries(data.references)) {
			if (key !== ref.key) {
				console.warn(
					`Reference stored under "${key}" has key "${ref.key}" in ${projectFile}, using "${key}"`
				);
			}
			project.addReference(
				createReference(key, ref.entryType, ref.fields, {
					originalKey: ref.originalKey,
					filePath: ref.filePath,
				})
			);
		}
		return project;
	}

	async listProjects(): Promise<string[]> {
		if (!(await fileExists(this.projectsFile))) {
			return [];
		}
		const data = parseJson(
			await readTextFile(this.projectsFile),
			projectsListSchema,
			this.projectsFile
		);
		return data.projects;
	}

	/**
	 * Rebuild `projects.json` from the directories that hold a project file.
	 */
	async updateProjectsList(): Promise<void> {
		await this.ensureBaseDir();

		let names: string[];
		try {
			const entries = await readdir(this.baseDir, { withFileTypes: true });
			names = entries
				.filter((entry) => entry.isDirectory())
				.map((entry) => entry.name);
		} catch (error) {
			throw new IOError("Failed to scan directory", this.baseDir, error);
		}

		const projects: string[] = [];
		for (const name of names.sort()) {
			if (await fileExists(join(this.baseDir, name, PROJECT_FILE))) {
				projects.push(name);
			}
		}

		await writeTextFile(
			this.projectsFile,
			JSON.stringify({ projects }, null, 2)
		);
	}

	/**
	 * Delete a project directory and everything in it.
	 * @returns false when there was no such project
	 */
	async deleteProject(projectName: string): Promise<boolean> {
		const projectDir = join(this.baseDir, projectName);
		if (!(await fileExists(projectDir))) {
			return false;
		}

		try {
			await rm(projectDir, { recursive: true, force: true });
		} catch (error) {
			throw new IOError("Failed to delete project", projectDir, error);
		}

		await this.updateProjectsList();
		return true;
	}

	async copyFile(sourcePath: string, destPath: string): Promise<void> {
		try {
			await copyFile(sourcePath, destPath);
		} catch (error) {
			throw new IOError(`Failed to copy ${sourcePath}`, destPath, error);
		}
	}
}
