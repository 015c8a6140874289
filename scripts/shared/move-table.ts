import { readFile } from "node:fs/promises";
import { extname } from "node:path";
import { escapesRoot, joinTreePath, normalizeTreePath } from "./link-resolution.js";
import { migrationDescriptorSchema } from "./schemas.js";
import type { MoveGroup } from "./schemas.js";
import type { FileLocation, MoveTable, TreeLayout } from "./types.js";
import { MigrationConfigError } from "./types.js";

export type MovePair = readonly [from: string, to: string];

/** Parsed migration descriptor, paths still relative to `base` */
export interface MigrationDescriptor {
	base: string;
	moves: MovePair[];
	groups: MoveGroup[];
}

const checkTreePath = (raw: string, role: string): string => {
	const path = normalizeTreePath(raw.trim());
	if (!path || raw.trim().startsWith("/") || escapesRoot(path)) {
		throw new MigrationConfigError(`Invalid ${role} "${raw}": must be a path inside the content root`);
	}
	if (!path.endsWith(".md")) {
		throw new MigrationConfigError(`Invalid ${role} "${raw}": must name a .md file`);
	}
	return path;
};

/**
 * Build the read-only move table. Identity entries are dropped; duplicate destinations,
 * conflicting sources and paths that are both moved and a move destination are rejected.
 */
export const createMoveTable = (pairs: Iterable<MovePair>): MoveTable => {
	const forward = new Map<string, string>();
	const reverse = new Map<string, string>();

	for (const [rawFrom, rawTo] of pairs) {
		const from = checkTreePath(rawFrom, "move source");
		const to = checkTreePath(rawTo, "move destination");
		if (from === to) continue;

		const existing = forward.get(from);
		if (existing !== undefined) {
			if (existing === to) continue;
			throw new MigrationConfigError(`${from} is moved to both ${existing} and ${to}`);
		}
		const claimed = reverse.get(to);
		if (claimed !== undefined) {
			throw new MigrationConfigError(`${claimed} and ${from} are both moved to ${to}`);
		}
		forward.set(from, to);
		reverse.set(to, from);
	}

	for (const [from, to] of forward) {
		const origin = reverse.get(from);
		if (origin !== undefined) {
			throw new MigrationConfigError(`${from} is moved to ${to} but is also the destination of ${origin}`);
		}
	}

	return { forward, reverse };
};

/** Parse the plain list format: one `old.md -> new.md` (or `old.md new.md`) per line, `#` comments */
export const parseMoveList = (text: string, source: string): MovePair[] => {
	const pairs: MovePair[] = [];
	const lines = text.split(/\r?\n/);
	for (let i = 0; i < lines.length; i++) {
		const line = (lines[i] ?? "").trim();
		if (!line || line.startsWith("#")) continue;
		const [from, to, ...rest] = line.split(/\s*->\s*|\s+/).filter(Boolean);
		if (!from || !to || rest.length > 0) {
			throw new MigrationConfigError(`${source}:${i + 1}: expected "old.md -> new.md", got "${line}"`);
		}
		pairs.push([from, to]);
	}
	return pairs;
};

/** Read a migration descriptor: `.json` is validated against the descriptor schema, anything else is a plain list */
export const readDescriptor = async (path: string): Promise<MigrationDescriptor> => {
	let raw: string;
	try {
		raw = await readFile(path, "utf-8");
	} catch (err) {
		throw new MigrationConfigError(
			`Cannot read move table ${path}: ${err instanceof Error ? err.message : String(err)}`,
		);
	}

	if (extname(path).toLowerCase() !== ".json") {
		return { base: "", moves: parseMoveList(raw, path), groups: [] };
	}

	let json: unknown;
	try {
		json = JSON.parse(raw);
	} catch (err) {
		throw new MigrationConfigError(
			`Move table ${path} is not valid JSON: ${err instanceof Error ? err.message : String(err)}`,
		);
	}

	const result = migrationDescriptorSchema.safeParse(json);
	if (!result.success) {
		const details = result.error.issues.map((i) => `${i.path.join(".") || "(root)"}: ${i.message}`).join("; ");
		throw new MigrationConfigError(`Invalid move table ${path}: ${details}`);
	}

	const { moves, groups } = result.data;
	const base = normalizeTreePath(result.data.base ?? "");
	if (result.data.base?.startsWith("/") || escapesRoot(base)) {
		throw new MigrationConfigError(`Invalid base "${result.data.base}": must be a directory inside the content root`);
	}

	const pairs: MovePair[] = Array.isArray(moves) ? moves.map((m) => [m.from, m.to] as const) : Object.entries(moves);
	return { base, moves: pairs, groups };
};

/**
 * Derive moves from flat-prefix groups. A flat file `<base>/<prefix>-<name>.md` moves to
 * `<base>/<dir>/<name>.md`; a file already at the nested path is mapped back the same way, so
 * the derivation works before or after the files are moved. With `index`, `<prefix>.md` moves
 * to `<dir>/<index>`. The longest matching prefix wins.
 */
export const deriveGroupMoves = (files: readonly string[], groups: readonly MoveGroup[], base = ""): MovePair[] => {
	const scope = base ? `${base}/` : "";
	const byPrefix = [...groups].sort((a, b) => b.prefix.length - a.prefix.length);
	const pairs = new Map<string, string>();

	for (const file of files) {
		if (!file.startsWith(scope)) continue;
		const rel = file.slice(scope.length);

		for (const group of byPrefix) {
			const dir = group.dir ?? group.prefix;
			let from: string | undefined;
			let to: string | undefined;

			if (!rel.includes("/")) {
				const name = rel.slice(0, -".md".length);
				if (name.startsWith(`${group.prefix}-`)) {
					from = rel;
					to = `${dir}/${name.slice(group.prefix.length + 1)}.md`;
				} else if (group.index && name === group.prefix) {
					from = rel;
					to = `${dir}/${group.index}`;
				}
			} else if (rel.startsWith(`${dir}/`) && !rel.slice(dir.length + 1).includes("/")) {
				const name = rel.slice(dir.length + 1);
				from = name === group.index ? `${group.prefix}.md` : `${group.prefix}-${name}`;
				to = rel;
			}

			if (from !== undefined && to !== undefined) {
				const key = `${scope}${from}`;
				if (!pairs.has(key)) pairs.set(key, `${scope}${to}`);
				break;
			}
		}
	}

	return [...pairs];
};

/**
 * Combine explicit and derived moves into the move table. Explicit entries win: a derived
 * pair is dropped when its source or destination is already claimed.
 */
export const buildMoveTable = (descriptor: MigrationDescriptor, files: readonly string[]): MoveTable => {
	const claimedFrom = new Set<string>();
	const claimedTo = new Set<string>();
	const pairs: MovePair[] = [];

	for (const [from, to] of descriptor.moves) {
		for (const raw of [from, to]) {
			if (raw.trim().startsWith("/")) {
				throw new MigrationConfigError(`Invalid move "${raw}": paths are relative to the content root`);
			}
		}
		const scopedFrom = joinTreePath(descriptor.base, from.trim());
		const scopedTo = joinTreePath(descriptor.base, to.trim());
		claimedFrom.add(scopedFrom);
		claimedTo.add(scopedTo);
		pairs.push([scopedFrom, scopedTo]);
	}

	for (const [from, to] of deriveGroupMoves(files, descriptor.groups, descriptor.base)) {
		if (claimedFrom.has(from) || claimedTo.has(to)) continue;
		pairs.push([from, to]);
	}

	return createMoveTable(pairs);
};

/** Read the descriptor at `path` and build the move table against the current file list */
export const loadMoveTable = async (path: string, files: readonly string[]): Promise<MoveTable> =>
	buildMoveTable(await readDescriptor(path), files);

/**
 * Place every current file in the migration: where it was and where it ends up. A file still
 * at an old path whose new path also exists is a stale copy and takes no part in the result.
 */
export const buildTreeLayout = (files: readonly string[], moves: MoveTable): TreeLayout => {
	const present = new Set(files);
	const locations = new Map<string, FileLocation>();
	const staleCopies = new Set<string>();

	for (const file of files) {
		const origin = moves.reverse.get(file);
		const destination = moves.forward.get(file);
		if (origin !== undefined) {
			locations.set(file, { oldPath: origin, newPath: file });
		} else if (destination !== undefined) {
			if (present.has(destination)) staleCopies.add(file);
			locations.set(file, { oldPath: file, newPath: destination });
		} else {
			locations.set(file, { oldPath: file, newPath: file });
		}
	}

	const finalPaths = new Set<string>();
	for (const [file, location] of locations) {
		if (!staleCopies.has(file)) finalPaths.add(location.newPath);
	}

	return { moves, files: locations, finalPaths, staleCopies };
};
