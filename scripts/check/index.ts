import { resolve } from "node:path";
import * as p from "@clack/prompts";
import { printSummary } from "../shared/cli.js";
import { buildTreeLayout, createMoveTable } from "../shared/move-table.js";
import { listMarkdownFiles, scanContentTree } from "../shared/scanner.js";
import type { MigrationSummary } from "../shared/types.js";
import { collectDocuments } from "../migrate/index.js";
import { planRewrites } from "../migrate/planner.js";

/**
 * Quick pre-check: every relative `.md` link must resolve to a file in the tree. Uses the
 * migration pipeline with an empty move table, so nothing is ever rewritten. The site
 * generator's strict build remains the real oracle.
 */
export const runCheck = async (rootPath: string): Promise<MigrationSummary> => {
	const root = resolve(rootPath);
	const files = await listMarkdownFiles(root);
	const layout = buildTreeLayout(files, createMoveTable([]));

	p.log.info(`Checking ${files.length} Markdown files in ${root}`);

	const documents = await collectDocuments(scanContentTree(root, files));
	const plan = planRewrites(documents, layout);

	const summary: MigrationSummary = {
		dryRun: true,
		filesScanned: documents.length,
		linksScanned: documents.reduce((n, doc) => n + doc.links.length, 0),
		editsPlanned: plan.edits.length,
		editsApplied: 0,
		filesModified: 0,
		issues: plan.issues,
		warnings: plan.warnings,
	};

	printSummary(summary);
	return summary;
};
