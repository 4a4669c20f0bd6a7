import { z } from "zod";
import { CITATION_STYLES, ReferenceManagerSettings } from "./interfaces";

// Default settings
export const DEFAULT_SETTINGS: ReferenceManagerSettings = {
	baseDir: "references",
	defaultCitationStyle: "cite",
	bibliographyFilename: "bibliography",
	bibliographyFormat: "bibtex" as const,
	supportedFileTypes: ["pdf"],
};

export const DEFAULT_CONFIG_FILE = "refman.config.json";

// Every key is optional: a settings file only overrides what it names
export const settingsFileSchema = z
	.object({
		baseDir: z.string().min(1),
		defaultCitationStyle: z.enum(CITATION_STYLES),
		bibliographyFilename: z.string().min(1),
		bibliographyFormat: z.enum(["bibtex", "csl-json"]),
		supportedFileTypes: z.array(z.string()),
	})
	.partial()
	.strict();
