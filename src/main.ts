import { ValidationError, errorMessage } from "./errors";
import { FileManager } from "./fileManager";
import { ProjectManager } from "./projectManager";
import { ReferenceManagerSettings } from "./types/interfaces";
import {
	DEFAULT_CONFIG_FILE,
	DEFAULT_SETTINGS,
	settingsFileSchema,
} from "./types/settings";
import { fileExists, readTextFile, writeTextFile } from "./utils/files";

export function resolveConfigPath(configPath?: string): string {
	return configPath || process.env.REFMAN_CONFIG || DEFAULT_CONFIG_FILE;
}

/**
 * Settings from a JSON file layered over the defaults. A missing file means
 * defaults.
 */
export async function loadSettings(
	configPath: string
): Promise<ReferenceManagerSettings> {
	if (!(await fileExists(configPath))) {
		return { ...DEFAULT_SETTINGS };
	}

	let data: unknown;
	try {
		data = JSON.parse(await readTextFile(configPath));
	} catch (error) {
		if (error instanceof SyntaxError) {
			throw new ValidationError(
				`Invalid settings file ${configPath}: ${errorMessage(error)}`
			);
		}
		throw error;
	}

	const result = settingsFileSchema.safeParse(data);
	if (!result.success) {
		const keys = result.error.issues.map(
			(issue) => issue.path.join(".") || issue.message
		);
		throw new ValidationError(
			`Invalid settings in ${configPath}: ${keys.join(", ")}`
		);
	}

	return Object.assign({}, DEFAULT_SETTINGS, result.data);
}

export default class ReferenceManagerApp {
	readonly settings: ReferenceManagerSettings;
	readonly fileManager: FileManager;
	readonly projectManager: ProjectManager;

	constructor(settings: ReferenceManagerSettings = DEFAULT_SETTINGS) {
		this.settings = settings;
		this.fileManager = new FileManager(settings.baseDir);
		this.projectManager = new ProjectManager(
			this.fileManager,
			this.fileManager,
			settings
		);
	}

	static async load(configPath?: string): Promise<ReferenceManagerApp> {
		const app = new ReferenceManagerApp(
			await loadSettings(resolveConfigPath(configPath))
		);
		await app.fileManager.ensureBaseDir();
		return app;
	}

	/** @returns the path written */
	async saveSettings(configPath?: string): Promise<string> {
		const filePath = resolveConfigPath(configPath);
		await writeTextFile(filePath, JSON.stringify(this.settings, null, 2));
		return filePath;
	}
}
