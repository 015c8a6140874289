import { execSync } from "node:child_process";
import * as p from "@clack/prompts";
import type { MigrationIssue } from "../shared/types.js";

/** Environment fallback for `--validate` */
export const VALIDATE_ENV = "MIGRATE_LINKS_VALIDATE";

/** Pick the strict-build command: explicit flag first, then the environment */
export const resolveValidateCommand = (flag?: string): string | undefined => {
	const command = flag ?? process.env[VALIDATE_ENV];
	return command?.trim() ? command.trim() : undefined;
};

/**
 * Run the site generator's strict build (e.g. `mkdocs build --strict`). The build is the
 * authority on broken links; a non-zero exit becomes an issue.
 */
export const runValidation = (command: string, cwd: string): MigrationIssue | null => {
	p.log.info(`Validating: ${command}`);
	try {
		execSync(command, { cwd, stdio: "inherit" });
		return null;
	} catch (err) {
		const status = typeof err === "object" && err !== null && "status" in err ? err.status : undefined;
		return {
			kind: "validation-failed",
			file: cwd,
			message: `Validation command failed${typeof status === "number" ? ` with exit code ${status}` : ""}: ${command}`,
		};
	}
};
