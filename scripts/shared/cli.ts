import * as p from "@clack/prompts";
import color from "picocolors";
import type { MigrationIssue, MigrationSummary, MigrationWarning, RewriteEdit } from "./types.js";

const plural = (n: number, word: string): string => `${n} ${word}${n === 1 ? "" : "s"}`;

/** `file:line: message` */
export const formatFinding = (finding: MigrationIssue | MigrationWarning): string =>
	`${finding.file}${finding.line !== undefined ? `:${finding.line}` : ""}: ${finding.message}`;

/** Print proposed or applied edits, one block per file, in document order */
export const printEdits = (edits: readonly RewriteEdit[]): void => {
	const byFile = new Map<string, RewriteEdit[]>();
	for (const edit of edits) {
		byFile.set(edit.file, [...(byFile.get(edit.file) ?? []), edit]);
	}

	for (const [file, fileEdits] of byFile) {
		const lines = [...fileEdits]
			.sort((a, b) => a.offset - b.offset)
			.map((e) => `  ${color.dim(`L${e.line}`)} ${e.original} ${color.dim("→")} ${color.cyan(e.replacement)}`);
		p.log.message(`${color.bold(file)}\n${lines.join("\n")}`);
	}
};

/** Ask before writing. Cancelling exits like every other prompt in the CLI. */
export const confirmApply = async (edits: number, files: number): Promise<boolean> => {
	const result = await p.confirm({
		message: `Rewrite ${plural(edits, "link")} in ${plural(files, "file")}?`,
		initialValue: true,
	});

	if (p.isCancel(result)) {
		p.cancel("Operation cancelled.");
		process.exit(0);
	}

	return result;
};

/** Final report: totals, then warnings, then issues */
export const printSummary = (summary: MigrationSummary): void => {
	const conflicts = summary.issues.filter((i) => i.kind === "write-conflict").length;
	const unresolved = summary.issues.filter((i) => i.kind === "unresolvable-target").length;
	const malformed = summary.issues.filter((i) => i.kind === "malformed-link").length;
	const ambiguous = summary.issues.filter((i) => i.kind === "ambiguous-link").length;

	const totals = [
		`Files scanned:  ${summary.filesScanned}`,
		`Links scanned:  ${summary.linksScanned}`,
		summary.dryRun
			? `Edits planned:  ${summary.editsPlanned} ${color.dim("(dry run, nothing written)")}`
			: `Edits applied:  ${summary.editsApplied} of ${summary.editsPlanned}`,
		`Files modified: ${summary.filesModified}`,
		`Conflicts:      ${conflicts}`,
		`Unresolved:     ${unresolved}`,
		`Malformed:      ${malformed}`,
		`Ambiguous:      ${ambiguous}`,
		`Warnings:       ${summary.warnings.length}`,
	];
	p.log.info(totals.join("\n"));

	for (const warning of summary.warnings) p.log.warn(formatFinding(warning));
	for (const issue of summary.issues) p.log.error(formatFinding(issue));

	if (summary.issues.length === 0) {
		p.log.success(color.green("No broken links left to fix."));
	} else {
		p.log.error(color.red(`${plural(summary.issues.length, "problem")} need manual follow-up.`));
	}
};
