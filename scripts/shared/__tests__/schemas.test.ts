import { describe, expect, it } from "vitest";
import { migrationDescriptorSchema, moveEntrySchema, moveGroupSchema } from "../schemas.js";

describe("moveEntrySchema", () => {
	it("accepts a from/to pair", () => {
		expect(moveEntrySchema.safeParse({ from: "a.md", to: "topic/a.md" }).success).toBe(true);
	});

	it("rejects empty paths", () => {
		const result = moveEntrySchema.safeParse({ from: "", to: "topic/a.md" });
		expect(result.success).toBe(false);
		if (!result.success) {
			expect(result.error.issues[0]!.message).toBe("Move source must not be empty");
		}
	});
});

describe("moveGroupSchema", () => {
	it("accepts a prefix with optional dir and index", () => {
		expect(moveGroupSchema.safeParse({ prefix: "setup" }).success).toBe(true);
		expect(moveGroupSchema.safeParse({ prefix: "api-ref", dir: "reference/api", index: "index.md" }).success).toBe(
			true,
		);
	});

	it("rejects a prefix that spans directories", () => {
		const result = moveGroupSchema.safeParse({ prefix: "guides/setup" });
		expect(result.success).toBe(false);
		if (!result.success) {
			expect(result.error.issues[0]!.message).toBe("Group prefix must be a single path segment");
		}
	});

	it("rejects absolute dirs and non-Markdown index files", () => {
		expect(moveGroupSchema.safeParse({ prefix: "setup", dir: "/setup" }).success).toBe(false);
		expect(moveGroupSchema.safeParse({ prefix: "setup", index: "index.txt" }).success).toBe(false);
	});

	it("rejects unknown keys", () => {
		expect(moveGroupSchema.safeParse({ prefix: "setup", folder: "x" }).success).toBe(false);
	});
});

describe("migrationDescriptorSchema", () => {
	it("defaults moves and groups", () => {
		const result = migrationDescriptorSchema.safeParse({});
		expect(result.success).toBe(true);
		if (result.success) {
			expect(result.data).toEqual({ moves: {}, groups: [] });
		}
	});

	it("accepts moves as a record or as a list", () => {
		expect(migrationDescriptorSchema.safeParse({ moves: { "a.md": "topic/a.md" } }).success).toBe(true);
		expect(migrationDescriptorSchema.safeParse({ moves: [{ from: "a.md", to: "topic/a.md" }] }).success).toBe(true);
	});

	it("rejects non-string destinations and unknown top-level keys", () => {
		expect(migrationDescriptorSchema.safeParse({ moves: { "a.md": 1 } }).success).toBe(false);
		expect(migrationDescriptorSchema.safeParse({ moves: {}, redirects: {} }).success).toBe(false);
	});
});
