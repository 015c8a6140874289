import { resolveLink, treeDirname } from "../shared/link-resolution.js";
import type {
	MigrationIssue,
	MigrationWarning,
	RewriteEdit,
	RewritePlan,
	ScannedDocument,
	TreeLayout,
} from "../shared/types.js";

/**
 * Decide, link by link, which destinations must change. Every edit is anchored to the offset
 * the scanner found, never to a text search over the file.
 *
 * Edits come out grouped by file (sorted by path) and in descending offset order within a
 * file, so applying them in sequence never shifts an offset still to be applied.
 */
export const planRewrites = (documents: Iterable<ScannedDocument>, layout: TreeLayout): RewritePlan => {
	const edits: RewriteEdit[] = [];
	const issues: MigrationIssue[] = [];
	const warnings: MigrationWarning[] = [];

	for (const doc of documents) {
		issues.push(...doc.issues);

		if (layout.staleCopies.has(doc.path)) {
			warnings.push({
				kind: "stale-copy",
				file: doc.path,
				message: `Still present although it was moved to ${layout.moves.forward.get(doc.path) ?? "a new location"}; not rewritten`,
			});
			continue;
		}

		const location = layout.files.get(doc.path) ?? { oldPath: doc.path, newPath: doc.path };
		const oldDir = treeDirname(location.oldPath);
		const newDir = treeDirname(location.newPath);

		for (const link of doc.links) {
			const result = resolveLink(link.target, oldDir, newDir, layout);

			switch (result.status) {
				case "rewrite":
					edits.push({
						file: doc.path,
						offset: link.offset,
						line: link.line,
						original: link.target,
						replacement: result.target,
					});
					break;
				case "unresolvable":
					issues.push({
						kind: "unresolvable-target",
						file: doc.path,
						line: link.line,
						target: link.target,
						message: `Cannot resolve "${link.target}": ${result.reason}`,
					});
					break;
				case "outside-root":
					if (oldDir !== newDir) {
						warnings.push({
							kind: "outside-root",
							file: doc.path,
							line: link.line,
							target: link.target,
							message: `"${link.target}" points outside the content root; left unchanged`,
						});
					}
					break;
				case "unchanged":
					if (result.ambiguousWith !== undefined) {
						issues.push({
							kind: "ambiguous-link",
							file: doc.path,
							line: link.line,
							target: link.target,
							message: `"${link.target}" already resolves from the new location; it may have meant ${result.ambiguousWith}`,
						});
					}
					break;
			}
		}
	}

	edits.sort((a, b) => (a.file === b.file ? b.offset - a.offset : a.file < b.file ? -1 : 1));
	return { edits, issues, warnings };
};
