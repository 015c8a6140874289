import { resolve } from "node:path";
import * as p from "@clack/prompts";
import { confirmApply, printEdits, printSummary } from "../shared/cli.js";
import { buildTreeLayout, loadMoveTable } from "../shared/move-table.js";
import { listMarkdownFiles, scanContentTree } from "../shared/scanner.js";
import type { MigrationSummary, ScannedDocument } from "../shared/types.js";
import { applyRewrites } from "./executor.js";
import { planRewrites } from "./planner.js";
import { resolveValidateCommand, runValidation } from "./validate.js";

export interface MigrateOptions {
	/** Content root */
	root: string;
	/** Migration descriptor (.json or plain list) */
	moveTable: string;
	/** Scan and plan only; print proposed edits */
	dryRun?: boolean;
	/** Skip the confirmation prompt */
	yes?: boolean;
	/** Strict-build command to run after rewriting */
	validate?: string;
}

/** Drain the lazy scan into memory */
export const collectDocuments = async (scan: AsyncIterable<ScannedDocument>): Promise<ScannedDocument[]> => {
	const documents: ScannedDocument[] = [];
	for await (const doc of scan) documents.push(doc);
	return documents;
};

/**
 * Scan → plan → apply → validate. Configuration errors throw before anything is read or
 * written; everything else is collected into the returned summary.
 */
export const runMigrate = async (options: MigrateOptions): Promise<MigrationSummary> => {
	const root = resolve(options.root);
	const files = await listMarkdownFiles(root);
	const moves = await loadMoveTable(resolve(options.moveTable), files);
	const layout = buildTreeLayout(files, moves);

	p.log.info(`Move table: ${moves.forward.size} moved files. Scanning ${files.length} Markdown files in ${root}`);

	const documents = await collectDocuments(scanContentTree(root, files));
	const plan = planRewrites(documents, layout);

	const summary: MigrationSummary = {
		dryRun: options.dryRun === true,
		filesScanned: documents.length,
		linksScanned: documents.reduce((n, doc) => n + doc.links.length, 0),
		editsPlanned: plan.edits.length,
		editsApplied: 0,
		filesModified: 0,
		issues: [...plan.issues],
		warnings: [...plan.warnings],
	};

	if (plan.edits.length > 0) printEdits(plan.edits);

	if (options.dryRun) {
		printSummary(summary);
		return summary;
	}

	if (plan.edits.length > 0) {
		const fileCount = new Set(plan.edits.map((e) => e.file)).size;
		if (!options.yes && process.stdin.isTTY && !(await confirmApply(plan.edits.length, fileCount))) {
			p.log.warn("Nothing written.");
			printSummary(summary);
			return summary;
		}

		const report = await applyRewrites(root, plan.edits);
		summary.editsApplied = report.editsApplied;
		summary.filesModified = report.filesModified;
		summary.issues.push(...report.conflicts);
	}

	const command = resolveValidateCommand(options.validate);
	if (command && summary.issues.length === 0) {
		const failure = runValidation(command, process.cwd());
		if (failure) summary.issues.push(failure);
	}

	printSummary(summary);
	return summary;
};
