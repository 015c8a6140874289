/**
 * Path algebra for relative Markdown links inside a content tree.
 * Tree paths are POSIX, relative to the content root, with no leading "./" or "/";
 * the root directory itself is "".
 */
import { posix } from "node:path";
import type { Resolution, TreeLayout } from "./types.js";

/** Normalize a tree path: collapse "." and "..", drop "./" and trailing slashes. Leading ".." is kept. */
export const normalizeTreePath = (path: string): string => {
	const normalized = posix.normalize(path).replace(/^\.\//, "").replace(/\/+$/, "");
	return normalized === "." ? "" : normalized;
};

/** Resolve `relative` against a tree directory */
export const joinTreePath = (dir: string, relative: string): string =>
	normalizeTreePath(dir ? `${dir}/${relative}` : relative);

/** Directory part of a tree path ("" for files at the root) */
export const treeDirname = (path: string): string => {
	const dir = posix.dirname(path);
	return dir === "." ? "" : dir;
};

/** True when a normalized tree path points above the content root */
export const escapesRoot = (path: string): boolean => path === ".." || path.startsWith("../");

/** Relative link path from a tree directory to a tree file. Same directory → bare filename. */
export const relativeTreePath = (fromDir: string, to: string): string => posix.relative(`/${fromDir}`, `/${to}`);

/** Split a link destination into its path and the verbatim `#anchor` / `?query` suffix */
export const splitTarget = (target: string): { path: string; suffix: string } => {
	const at = target.search(/[#?]/);
	return at < 0 ? { path: target, suffix: "" } : { path: target.slice(0, at), suffix: target.slice(at) };
};

/** Decode percent-escapes in a link path. Returns null on a broken escape. */
export const decodeLinkPath = (path: string): string | null => {
	try {
		return decodeURI(path);
	} catch {
		return null;
	}
};

/** Where a tree path ends up after the migration, if it names a document at all */
const locate = (path: string, layout: TreeLayout): string | undefined => {
	const movedTo = layout.moves.forward.get(path);
	if (movedTo !== undefined) return layout.finalPaths.has(movedTo) ? movedTo : undefined;
	return layout.finalPaths.has(path) ? path : undefined;
};

/**
 * Work out what a link should read once its source file sits in `sourceNewDir`.
 *
 * A link that already resolves from the new directory is left alone; otherwise it is read
 * as written for `sourceOldDir`, its target is followed through the move table, and the
 * path is recomputed from the new directory. Anchors and queries are never touched.
 */
export const resolveLink = (
	target: string,
	sourceOldDir: string,
	sourceNewDir: string,
	layout: TreeLayout,
): Resolution => {
	const { path, suffix } = splitTarget(target);
	const decoded = decodeLinkPath(path);
	if (decoded === null) return { status: "unresolvable", reason: `invalid percent-encoding in "${path}"` };

	const fromNew = joinTreePath(sourceNewDir, decoded);
	const fromOld = joinTreePath(sourceOldDir, decoded);

	if (layout.finalPaths.has(fromNew)) {
		const alternative = sourceOldDir !== sourceNewDir ? locate(fromOld, layout) : undefined;
		return alternative !== undefined && alternative !== fromNew
			? { status: "unchanged", ambiguousWith: alternative }
			: { status: "unchanged" };
	}

	const movedTo = layout.moves.forward.get(fromOld);
	if (movedTo !== undefined && !layout.finalPaths.has(movedTo)) {
		return { status: "unresolvable", reason: `${fromOld} was moved to ${movedTo}, which does not exist` };
	}

	const destination = locate(fromOld, layout) ?? locate(fromNew, layout);
	if (destination === undefined) {
		if (escapesRoot(fromOld) && escapesRoot(fromNew)) return { status: "outside-root" };
		const missing = escapesRoot(fromOld) ? fromNew : fromOld;
		return { status: "unresolvable", reason: `${missing} does not exist and is not in the move table` };
	}

	let rewritten = relativeTreePath(sourceNewDir, destination);
	if (path.includes("%") || /\s/.test(rewritten)) rewritten = encodeURI(rewritten);
	if (path.startsWith("./") && !rewritten.startsWith("../")) rewritten = `./${rewritten}`;

	const next = `${rewritten}${suffix}`;
	return next === target ? { status: "unchanged" } : { status: "rewrite", target: next, resolvedTarget: destination };
};
