import { readdir, readFile, stat } from "node:fs/promises";
import { join } from "node:path";
import matter from "gray-matter";
import { decodeLinkPath, joinTreePath, splitTarget, treeDirname } from "./link-resolution.js";
import type { LinkKind, LinkReference, MigrationIssue, ScannedDocument } from "./types.js";
import { MigrationConfigError } from "./types.js";

const SKIP_DIR_NAMES = new Set(["node_modules"]);

/** `[label]: destination` at the start of a line */
const REFERENCE_DEF_RE = /^ {0,3}\[([^\]^][^\]]*)\]:[ \t]*(<[^>\n]*>|\S+)/;

/** A fence at any indent; nested fences (admonitions, tabs, list items) are indented */
const FENCE_RE = /^([ \t]*)(`{3,}|~{3,})(.*)$/;

/** Closing `---` line of a front matter block */
const FRONT_MATTER_CLOSE_RE = /\r?\n---[ \t]*(?:\r?\n|$)/;

/** Recursively collect `.md` files below `dir`, as tree paths. Skips dot-directories and node_modules. */
const walkMarkdown = async (root: string, rel: string): Promise<string[]> => {
	const entries = await readdir(rel ? join(root, rel) : root, { withFileTypes: true });
	const files: string[] = [];

	for (const entry of entries) {
		const path = rel ? `${rel}/${entry.name}` : entry.name;
		if (entry.isDirectory()) {
			if (entry.name.startsWith(".") || SKIP_DIR_NAMES.has(entry.name)) continue;
			files.push(...(await walkMarkdown(root, path)));
		} else if (entry.isFile() && entry.name.endsWith(".md")) {
			files.push(path);
		}
	}

	return files;
};

/** Sorted content-root-relative paths of every Markdown file under root */
export const listMarkdownFiles = async (root: string): Promise<string[]> => {
	const info = await stat(root).catch(() => null);
	if (!info?.isDirectory()) {
		throw new MigrationConfigError(`Content root not found or not a directory: ${root}`);
	}
	return (await walkMarkdown(root, "")).sort();
};

/**
 * Index where the Markdown body starts. Front matter is located with gray-matter but never
 * interpreted, so broken YAML in a page does not stop the scan. A leading `---` without a
 * closing line is a thematic break, not front matter.
 */
const bodyStart = (content: string): number => {
	if (!/^---[ \t]*\r?\n/.test(content) || !FRONT_MATTER_CLOSE_RE.test(content.slice(3))) return 0;
	const parsed = matter(content, { engines: { yaml: () => ({}) } });
	return content.length - parsed.content.length;
};

const indentWidth = (indent: string): number => indent.replace(/\t/g, "    ").length;

/** True when the character at `at` is backslash-escaped */
const isEscaped = (text: string, at: number): boolean => {
	let slashes = 0;
	for (let i = at - 1; i >= 0 && text[i] === "\\"; i--) slashes++;
	return slashes % 2 === 1;
};

/** Ranges [start, end) of inline code spans in a paragraph */
const codeSpans = (text: string): Array<[number, number]> => {
	const spans: Array<[number, number]> = [];
	let open: { index: number; length: number } | null = null;
	for (const run of text.matchAll(/`+/g)) {
		const index = run.index ?? 0;
		if (!open) {
			open = { index, length: run[0].length };
		} else if (run[0].length === open.length) {
			spans.push([open.index, index + run[0].length]);
			open = null;
		}
	}
	return spans;
};

/** Index of the `]` that closes the `[` at `open`, counting nested brackets, or -1 */
const closingBracket = (text: string, open: number, inCode: (at: number) => boolean): number => {
	let depth = 0;
	for (let i = open; i < text.length; i++) {
		const ch = text[i];
		if (ch === "\\") {
			i++;
			continue;
		}
		if (inCode(i)) continue;
		if (ch === "[") depth++;
		if (ch === "]" && --depth === 0) return i;
	}
	return -1;
};

type ParsedDestination = { ok: true; target: string; start: number; end: number } | { ok: false; reason: string };

/** Parse an inline link destination (plus optional title) starting right after `](`. Stays on that line. */
const parseDestination = (text: string, from: number): ParsedDestination => {
	const newline = text.indexOf("\n", from);
	const lineEnd = newline < 0 ? text.length : newline;

	let i = from;
	while (text[i] === " " || text[i] === "\t") i++;

	let target: string;
	let start: number;
	if (text[i] === "<") {
		const close = text.indexOf(">", i + 1);
		if (close < 0 || close >= lineEnd) return { ok: false, reason: "unclosed <destination>" };
		start = i + 1;
		target = text.slice(start, close);
		i = close + 1;
	} else {
		start = i;
		let depth = 0;
		for (; i < lineEnd; i++) {
			const ch = text[i];
			if (ch === " " || ch === "\t") break;
			if (ch === "(") depth++;
			if (ch === ")") {
				if (depth === 0) break;
				depth--;
			}
		}
		target = text.slice(start, i);
	}

	let j = i;
	while (text[j] === " " || text[j] === "\t") j++;
	const quote = text[j];
	if (j > i && j < lineEnd && (quote === '"' || quote === "'")) {
		const close = text.indexOf(quote, j + 1);
		if (close < 0 || close >= lineEnd) return { ok: false, reason: "unclosed link title" };
		j = close + 1;
		while (text[j] === " " || text[j] === "\t") j++;
	}

	if (j >= lineEnd) return { ok: false, reason: "link is not closed before the end of the line" };
	if (text[j] !== ")") return { ok: false, reason: `unexpected text after "${target}"` };
	return { ok: true, target, start, end: j + 1 };
};

/** Relative link to a Markdown page: no scheme, not protocol- or site-relative, not anchor-only */
export const isRelativeMarkdownTarget = (target: string): boolean => {
	if (/^[a-z][a-z0-9+.-]*:/i.test(target) || target.startsWith("/") || target.startsWith("#")) return false;
	return splitTarget(target).path.toLowerCase().endsWith(".md");
};

/**
 * Extract relative `.md` links from one document. Front matter, fenced code blocks and inline
 * code are skipped. Inline links are matched per paragraph, so link text may wrap across lines
 * and may contain images. Problems are returned as issues and never stop the scan.
 */
export const extractLinks = (
	content: string,
	source: string,
): { links: LinkReference[]; issues: MigrationIssue[] } => {
	const links: LinkReference[] = [];
	const issues: MigrationIssue[] = [];
	const sourceDir = treeDirname(source);

	const lineStarts = [0];
	for (let i = content.indexOf("\n"); i >= 0; i = content.indexOf("\n", i + 1)) lineStarts.push(i + 1);

	/** 1-based line of a character offset */
	const lineAt = (offset: number): number => {
		let lo = 0;
		let hi = lineStarts.length - 1;
		while (lo < hi) {
			const mid = (lo + hi + 1) >> 1;
			if ((lineStarts[mid] ?? 0) <= offset) lo = mid;
			else hi = mid - 1;
		}
		return lo + 1;
	};

	const record = (kind: LinkKind, text: string, target: string, offset: number): void => {
		if (!isRelativeMarkdownTarget(target)) return;
		const line = lineAt(offset);
		const decoded = decodeLinkPath(splitTarget(target).path);
		if (decoded === null) {
			issues.push({
				kind: "malformed-link",
				file: source,
				line,
				target,
				message: `Invalid percent-encoding in "${target}"`,
			});
			return;
		}
		links.push({
			source,
			kind,
			text,
			target,
			offset,
			line,
			column: offset - (lineStarts[line - 1] ?? 0) + 1,
			resolved: joinTreePath(sourceDir, decoded),
		});
	};

	const scanParagraph = (base: number, text: string): void => {
		const spans = codeSpans(text);
		const inCode = (at: number): boolean => spans.some(([from, to]) => at >= from && at < to);

		let i = 0;
		while ((i = text.indexOf("[", i)) >= 0) {
			const open = i++;
			if (isEscaped(text, open) || inCode(open)) continue;

			const close = closingBracket(text, open, inCode);
			if (close < 0 || text[close + 1] !== "(") continue;

			const image = text[open - 1] === "!" && !isEscaped(text, open - 1);
			const parsed = parseDestination(text, close + 2);
			if (!parsed.ok) {
				const newline = text.indexOf("\n", close);
				const rest = text.slice(close, newline < 0 ? text.length : newline);
				if (!image && rest.includes(".md")) {
					issues.push({
						kind: "malformed-link",
						file: source,
						line: lineAt(base + close),
						message: `Malformed link: ${parsed.reason}`,
					});
				}
				continue;
			}
			i = parsed.end;
			if (image) continue;

			if (!parsed.target) {
				issues.push({
					kind: "malformed-link",
					file: source,
					line: lineAt(base + parsed.start),
					message: "Empty link target",
				});
				continue;
			}
			const label = text.slice(open + 1, close).replace(/[ \t]*\r?\n[ \t]*/g, " ");
			record("inline", label, parsed.target, base + parsed.start);
		}
	};

	let paragraph: { start: number; end: number } | null = null;
	const flush = (): void => {
		if (paragraph) scanParagraph(paragraph.start, content.slice(paragraph.start, paragraph.end));
		paragraph = null;
	};

	let fence: { char: string; length: number; indent: number } | null = null;
	const bodyOffset = bodyStart(content);
	let lineStart = bodyOffset;

	for (const line of content.slice(bodyOffset).split("\n")) {
		const fenceMatch = FENCE_RE.exec(line);
		const marker = fenceMatch?.[2];

		if (fence) {
			if (
				fenceMatch &&
				marker &&
				marker[0] === fence.char &&
				marker.length >= fence.length &&
				indentWidth(fenceMatch[1] ?? "") <= fence.indent &&
				!(fenceMatch[3] ?? "").trim()
			) {
				fence = null;
			}
		} else if (fenceMatch && marker) {
			flush();
			fence = { char: marker[0] ?? "`", length: marker.length, indent: indentWidth(fenceMatch[1] ?? "") };
		} else if (!line.trim()) {
			flush();
		} else {
			const reference = REFERENCE_DEF_RE.exec(line);
			if (reference?.[1] && reference[2]) {
				const raw = reference[2];
				const angled = raw.startsWith("<");
				const column = reference[0].length - raw.length + (angled ? 1 : 0);
				record("reference", reference[1], angled ? raw.slice(1, -1) : raw, lineStart + column);
			}
			paragraph = { start: paragraph?.start ?? lineStart, end: lineStart + line.length };
		}

		lineStart += line.length + 1;
	}
	flush();

	return { links, issues };
};

/**
 * Lazily scan every Markdown file under root, one document per step, in sorted path order.
 * Each call re-reads the tree, so a second pass sees the current contents.
 */
export async function* scanContentTree(root: string, files?: string[]): AsyncGenerator<ScannedDocument> {
	for (const path of files ?? (await listMarkdownFiles(root))) {
		const content = await readFile(join(root, path), "utf-8");
		const { links, issues } = extractLinks(content, path);
		yield { path, links, issues };
	}
}
