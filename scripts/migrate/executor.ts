import { readFile, writeFile } from "node:fs/promises";
import { join } from "node:path";
import type { ApplyReport, MigrationIssue, RewriteEdit } from "../shared/types.js";

/** Group edits by file, highest offset first within each file */
const groupByFile = (edits: readonly RewriteEdit[]): Map<string, RewriteEdit[]> => {
	const byFile = new Map<string, RewriteEdit[]>();
	for (const edit of edits) {
		const list = byFile.get(edit.file) ?? [];
		list.push(edit);
		byFile.set(edit.file, list);
	}
	for (const list of byFile.values()) list.sort((a, b) => b.offset - a.offset);
	return byFile;
};

const conflict = (edit: RewriteEdit, message: string): MigrationIssue => ({
	kind: "write-conflict",
	file: edit.file,
	line: edit.line,
	target: edit.original,
	message,
});

/**
 * Apply planned edits in place. Each file is read once, patched in memory from the end
 * backwards and written once. An edit whose original text is no longer at its offset is
 * skipped and reported as a conflict; the file's other edits still apply.
 */
export const applyRewrites = async (root: string, edits: readonly RewriteEdit[]): Promise<ApplyReport> => {
	let filesModified = 0;
	let editsApplied = 0;
	const conflicts: MigrationIssue[] = [];

	for (const [file, fileEdits] of groupByFile(edits)) {
		const path = join(root, file);

		let content: string;
		try {
			content = await readFile(path, "utf-8");
		} catch (err) {
			const reason = err instanceof Error ? err.message : String(err);
			conflicts.push(...fileEdits.map((e) => conflict(e, `File could not be read before writing: ${reason}`)));
			continue;
		}

		let applied = 0;
		for (const edit of fileEdits) {
			const end = edit.offset + edit.original.length;
			if (content.slice(edit.offset, end) !== edit.original) {
				conflicts.push(
					conflict(edit, `File changed since it was scanned; "${edit.original}" is no longer at line ${edit.line}`),
				);
				continue;
			}
			content = content.slice(0, edit.offset) + edit.replacement + content.slice(end);
			applied++;
		}

		if (applied > 0) {
			await writeFile(path, content, "utf-8");
			filesModified++;
			editsApplied += applied;
		}
	}

	return { filesModified, editsApplied, conflicts };
};
