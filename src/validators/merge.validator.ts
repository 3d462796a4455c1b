import { z } from "zod";

const secondaryRowSchema = z.object({
    name: z.string().default(""),
    phones: z.array(z.string()).min(1, "Each secondary row needs at least one phone value"),
});

export const mergeSchema = z.object({
    primaryCsv: z.string().trim().min(1, "primaryCsv must be a non-empty CSV document"),
    secondaryCsvs: z.array(z.string()).default([]),
    secondaryRows: z.array(secondaryRowSchema).default([]),
    enrichProtected: z.boolean().optional(),
    persist: z.boolean().default(false),
});

export const mergeFilesSchema = z.object({
    primaryPath: z.string().min(1, "primaryPath is required"),
    secondaryPaths: z.array(z.string().min(1)).default([]),
    enrichProtected: z.boolean().optional(),
    dryRun: z.boolean().default(false),
});

export type MergeInput = z.infer<typeof mergeSchema>;
export type MergeFilesInput = z.infer<typeof mergeFilesSchema>;
