#!/usr/bin/env node
import * as p from "@clack/prompts";
import color from "picocolors";
import { MigrationConfigError } from "./shared/types.js";

const VERSION = "0.1.0";

const USAGE = [
	"migrate-links [migrate] --root <dir> --move-table <file> [--dry-run] [--yes] [--validate <cmd>]",
	"migrate-links check --root <dir>",
].join("\n");

const parseArgs = (
	argv: string[],
): {
	command?: string;
	root?: string;
	moveTable?: string;
	validate?: string;
	dryRun: boolean;
	yes: boolean;
	help: boolean;
} => {
	let root: string | undefined;
	let moveTable: string | undefined;
	let validate: string | undefined;
	let dryRun = false;
	let yes = false;
	let help = false;
	const positional: string[] = [];
	for (let i = 2; i < argv.length; i++) {
		const arg = argv[i] ?? "";
		if (arg === "--root" || arg === "-r") {
			root = argv[++i];
		} else if (arg === "--move-table" || arg === "-m") {
			moveTable = argv[++i];
		} else if (arg === "--validate") {
			validate = argv[++i];
		} else if (arg === "--dry-run" || arg === "-n") {
			dryRun = true;
		} else if (arg === "--yes" || arg === "-y") {
			yes = true;
		} else if (arg === "--help" || arg === "-h") {
			help = true;
		} else if (!arg.startsWith("-")) {
			positional.push(arg);
		}
	}
	return { command: positional[0], root, moveTable, validate, dryRun, yes, help };
};

const main = async (): Promise<void> => {
	const { command, root, moveTable, validate, dryRun, yes, help } = parseArgs(process.argv);

	p.intro(`migrate-links v${VERSION}`);

	if (help) {
		p.log.message(USAGE);
		p.outro("Done!");
		return;
	}

	if (!root) throw new MigrationConfigError(`Missing --root <dir>\n${USAGE}`);

	switch (command) {
		case "check": {
			const { runCheck } = await import("./check/index.js");
			const summary = await runCheck(root);
			if (summary.issues.length > 0) process.exitCode = 1;
			break;
		}
		case undefined:
		case "migrate": {
			if (!moveTable) throw new MigrationConfigError(`Missing --move-table <file>\n${USAGE}`);
			const { runMigrate } = await import("./migrate/index.js");
			const summary = await runMigrate({ root, moveTable, dryRun, yes, validate });
			if (summary.issues.length > 0) process.exitCode = 1;
			break;
		}
		default:
			throw new MigrationConfigError(`Unknown command: ${command}\n${USAGE}`);
	}

	p.outro(process.exitCode ? color.red("Finished with problems") : "Done!");
};

main().catch((err) => {
	p.log.error(err instanceof Error ? err.message : String(err));
	process.exit(1);
});
