import { describe, it, expect } from "vitest";
import {
	normalizeTreePath,
	relativeTreePath,
	resolveLink,
	splitTarget,
	treeDirname,
} from "../link-resolution.js";
import { buildTreeLayout, createMoveTable } from "../move-table.js";
import type { MovePair } from "../move-table.js";

const layoutOf = (files: string[], moves: MovePair[]) => buildTreeLayout(files, createMoveTable(moves));

describe("path algebra", () => {
	it("normalizes tree paths", () => {
		expect(normalizeTreePath("./a/b/../c.md")).toBe("a/c.md");
		expect(normalizeTreePath("topic/")).toBe("topic");
		expect(normalizeTreePath("")).toBe("");
		expect(normalizeTreePath("a/../../x.md")).toBe("../x.md");
	});

	it("returns '' as the directory of root-level files", () => {
		expect(treeDirname("a.md")).toBe("");
		expect(treeDirname("topic/sub/a.md")).toBe("topic/sub");
	});

	it("computes relative paths between tree locations", () => {
		expect(relativeTreePath("", "topic/a.md")).toBe("topic/a.md");
		expect(relativeTreePath("topic", "shared.md")).toBe("../shared.md");
		expect(relativeTreePath("topic1", "topic2/b.md")).toBe("../topic2/b.md");
		expect(relativeTreePath("topic", "topic/a.md")).toBe("a.md");
	});

	it("splits off anchors and queries verbatim", () => {
		expect(splitTarget("a.md#Section-2")).toEqual({ path: "a.md", suffix: "#Section-2" });
		expect(splitTarget("a.md?v=1#x")).toEqual({ path: "a.md", suffix: "?v=1#x" });
		expect(splitTarget("a.md")).toEqual({ path: "a.md", suffix: "" });
	});
});

describe("resolveLink", () => {
	const moved = layoutOf(["b.md", "topic/a.md"], [["a.md", "topic/a.md"]]);

	it("points an unmoved file's link at the moved target", () => {
		expect(resolveLink("a.md", "", "", moved)).toEqual({
			status: "rewrite",
			target: "topic/a.md",
			resolvedTarget: "topic/a.md",
		});
	});

	it("adds ../ when the source moved but its target did not", () => {
		const layout = layoutOf(["shared.md", "topic/a.md"], [["a.md", "topic/a.md"]]);
		expect(resolveLink("shared.md", "", "topic", layout)).toEqual({
			status: "rewrite",
			target: "../shared.md",
			resolvedTarget: "shared.md",
		});
	});

	it("crosses between topic directories when both files moved", () => {
		const layout = layoutOf(
			["topic1/a.md", "topic2/b.md"],
			[
				["a.md", "topic1/a.md"],
				["b.md", "topic2/b.md"],
			],
		);
		expect(resolveLink("b.md", "", "topic1", layout)).toEqual({
			status: "rewrite",
			target: "../topic2/b.md",
			resolvedTarget: "topic2/b.md",
		});
		expect(resolveLink("../topic2/b.md", "", "topic1", layout)).toEqual({ status: "unchanged" });
	});

	it("uses a bare filename when target and source share the new directory", () => {
		const layout = layoutOf(
			["topic/a.md", "topic/b.md"],
			[
				["a.md", "topic/a.md"],
				["b.md", "topic/b.md"],
			],
		);
		expect(resolveLink("b.md", "", "topic", layout)).toEqual({ status: "unchanged" });
		expect(resolveLink("topic/b.md", "", "topic", layout)).toEqual({
			status: "rewrite",
			target: "b.md",
			resolvedTarget: "topic/b.md",
		});
	});

	it("keeps the anchor of a rewritten link", () => {
		expect(resolveLink("a.md#setup", "", "", moved)).toMatchObject({ status: "rewrite", target: "topic/a.md#setup" });
	});

	it("keeps a leading ./ when the new path does not climb", () => {
		expect(resolveLink("./a.md", "", "", moved)).toMatchObject({ status: "rewrite", target: "./topic/a.md" });
	});

	it("leaves links that already resolve untouched", () => {
		expect(resolveLink("topic/a.md", "", "", moved)).toEqual({ status: "unchanged" });
		expect(resolveLink("b.md", "", "", moved)).toEqual({ status: "unchanged" });
	});

	it("reports a target that is neither in the tree nor in the move table", () => {
		expect(resolveLink("gone.md", "", "", moved)).toEqual({
			status: "unresolvable",
			reason: "gone.md does not exist and is not in the move table",
		});
	});

	it("reports a moved target whose new location does not exist", () => {
		const layout = layoutOf(["b.md"], [["a.md", "topic/a.md"]]);
		expect(resolveLink("a.md", "", "", layout)).toEqual({
			status: "unresolvable",
			reason: "a.md was moved to topic/a.md, which does not exist",
		});
	});

	it("treats links above the content root as outside its scope", () => {
		expect(resolveLink("../other/x.md", "", "", moved)).toEqual({ status: "outside-root" });
	});

	it("follows a target that moved after the link was already written for the new location", () => {
		const layout = layoutOf(
			["topic1/a.md", "topic2/b.md"],
			[
				["a.md", "topic1/a.md"],
				["b.md", "topic2/b.md"],
			],
		);
		expect(resolveLink("../b.md", "", "topic1", layout)).toEqual({
			status: "rewrite",
			target: "../topic2/b.md",
			resolvedTarget: "topic2/b.md",
		});
	});

	it("decodes percent-escapes for lookup and encodes the rewritten path", () => {
		const layout = layoutOf(["guides/old name.md"], [["old name.md", "guides/old name.md"]]);
		expect(resolveLink("old%20name.md", "", "", layout)).toMatchObject({
			status: "rewrite",
			target: "guides/old%20name.md",
		});
	});

	it("flags a link that resolves from both the old and the new location", () => {
		const layout = layoutOf(["b.md", "topic/a.md", "topic/b.md"], [["a.md", "topic/a.md"]]);
		expect(resolveLink("b.md", "", "topic", layout)).toEqual({ status: "unchanged", ambiguousWith: "b.md" });
	});
});
