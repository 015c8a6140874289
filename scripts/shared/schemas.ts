import { z } from "zod";

/** Explicit move, array form */
export const moveEntrySchema = z.object({
	from: z.string().min(1, "Move source must not be empty"),
	to: z.string().min(1, "Move destination must not be empty"),
});

/** Flat-prefix group: `<prefix>-<name>.md` → `<dir>/<name>.md` */
export const moveGroupSchema = z
	.object({
		prefix: z.string().regex(/^[^/\s]+$/, "Group prefix must be a single path segment"),
		dir: z
			.string()
			.regex(/^[^/\s]+(\/[^/\s]+)*$/, "Group dir must be a relative directory")
			.optional(),
		index: z
			.string()
			.regex(/^[^/\s]+\.md$/, "Group index must be a .md file name")
			.optional(),
	})
	.strict();

export type MoveGroup = z.infer<typeof moveGroupSchema>;

/** JSON migration descriptor (the move table file) */
export const migrationDescriptorSchema = z
	.object({
		base: z.string().optional(),
		moves: z.union([z.record(z.string(), z.string()), z.array(moveEntrySchema)]).default({}),
		groups: z.array(moveGroupSchema).default([]),
	})
	.strict();
