#!/usr/bin/env node
import { parseArgs } from "util";
import { ValidationError, errorMessage } from "./errors";
import ReferenceManagerApp from "./main";
import { getReferenceCommands, runCommand } from "./setup";
import { BIBLIOGRAPHY_FORMAT_MAPPING, BibliographyFormat } from "./types/interfaces";

function isBibliographyFormat(value: string): value is BibliographyFormat {
	return Object.values(BIBLIOGRAPHY_FORMAT_MAPPING).some((format) => format === value);
}

function usage(): string {
	const lines = getReferenceCommands().map(
		(command) => `  ${`${command.id} ${command.usage}`.trim()}\n      ${command.name}`
	);
	return ["Usage: refman <command> [--config <file>]", "", "Commands:", ...lines].join("\n");
}

/**
 * Run one command line.
 * @returns process exit code
 */
export async function main(
	argv: string[] = process.argv.slice(2),
	notify: (message: string) => void = (message) => console.log(message)
): Promise<number> {
	try {
		const { values, positionals } = parseArgs({
			args: argv,
			allowPositionals: true,
			options: {
				config: { type: "string", short: "c" },
				style: { type: "string", short: "s" },
				format: { type: "string", short: "f" },
				help: { type: "boolean", short: "h" },
			},
		});

		const [commandId, ...args] = positionals;
		if (values.help || !commandId) {
			notify(usage());
			return values.help ? 0 : 1;
		}

		const { format } = values;
		if (format !== undefined && !isBibliographyFormat(format)) {
			throw new ValidationError(`Unknown format: ${format}`);
		}

		const app = await ReferenceManagerApp.load(values.config);
		await runCommand(
			app,
			commandId,
			args,
			{ style: values.style, format, config: values.config },
			notify
		);
		return 0;
	} catch (error) {
		console.error(`Error: ${errorMessage(error)}`);
		return 1;
	}
}

if (require.main === module) {
	main().then(
		(code) => {
			process.exitCode = code;
		},
		(error: unknown) => {
			console.error(error);
			process.exitCode = 1;
		}
	);
}
