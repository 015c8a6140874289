/** How a link appears in the source document */
export type LinkKind = "inline" | "reference";

/** A relative `.md` link found by the scanner */
export interface LinkReference {
	/** Content-root-relative path of the file containing the link */
	source: string;
	kind: LinkKind;
	/** Link text (or reference label) */
	text: string;
	/** Destination exactly as written, including any #anchor */
	target: string;
	/** Character index of `target` within the file */
	offset: number;
	/** 1-based */
	line: number;
	/** 1-based */
	column: number;
	/** Tree path the link currently points to, resolved against the source's directory */
	resolved: string;
}

export type IssueKind =
	| "malformed-link"
	| "unresolvable-target"
	| "ambiguous-link"
	| "write-conflict"
	| "validation-failed";

/** A per-link or per-file error. Any issue makes the run exit non-zero. */
export interface MigrationIssue {
	kind: IssueKind;
	file: string;
	line?: number;
	target?: string;
	message: string;
}

export type WarningKind = "outside-root" | "stale-copy";

export interface MigrationWarning {
	kind: WarningKind;
	file: string;
	line?: number;
	target?: string;
	message: string;
}

/** One scanned Markdown file */
export interface ScannedDocument {
	path: string;
	links: LinkReference[];
	issues: MigrationIssue[];
}

/** Immutable old → new mapping of relocated files */
export interface MoveTable {
	forward: ReadonlyMap<string, string>;
	reverse: ReadonlyMap<string, string>;
}

/** Where each current file lived before the move and where it lives after */
export interface FileLocation {
	oldPath: string;
	newPath: string;
}

export interface TreeLayout {
	moves: MoveTable;
	/** Keyed by the file's current path */
	files: ReadonlyMap<string, FileLocation>;
	/** New locations of every document in the finished tree */
	finalPaths: ReadonlySet<string>;
	/** Current paths of leftover files whose new location also exists */
	staleCopies: ReadonlySet<string>;
}

export type Resolution =
	| { status: "unchanged"; ambiguousWith?: string }
	| { status: "rewrite"; target: string; resolvedTarget: string }
	| { status: "unresolvable"; reason: string }
	| { status: "outside-root" };

/** A single offset-anchored text substitution */
export interface RewriteEdit {
	file: string;
	offset: number;
	line: number;
	original: string;
	replacement: string;
}

export interface RewritePlan {
	edits: RewriteEdit[];
	issues: MigrationIssue[];
	warnings: MigrationWarning[];
}

export interface ApplyReport {
	filesModified: number;
	editsApplied: number;
	conflicts: MigrationIssue[];
}

/** Totals and findings of one run, as printed at the end */
export interface MigrationSummary {
	dryRun: boolean;
	filesScanned: number;
	linksScanned: number;
	editsPlanned: number;
	editsApplied: number;
	filesModified: number;
	issues: MigrationIssue[];
	warnings: MigrationWarning[];
}

/** Thrown for problems that must stop the run before anything is written */
export class MigrationConfigError extends Error {
	constructor(message: string) {
		super(message);
		this.name = "MigrationConfigError";
	}
}
