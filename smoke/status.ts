import { z } from "zod";

import { MalformedPayloadError } from "./errors.js";

export const serverStatusSchema = z.object({
    // Missing keys and explicit nulls read as the fallback value.
    model_available: z
        .boolean()
        .nullish()
        .transform((v) => v ?? false),
    reason: z
        .string()
        .nullish()
        .transform((v) => v ?? "N/A"),
    supported_languages: z
        .array(z.string())
        .nullish()
        .transform((v) => v ?? []),
    server_version: z.string().optional(),
    apple_intelligence_compatible: z.boolean().optional(),
});

export type ServerStatus = z.infer<typeof serverStatusSchema>;

export function parseServerStatus(body: unknown): ServerStatus {
    const result = serverStatusSchema.safeParse(body);
    if (!result.success) {
        const details = result.error.issues
            .map((issue) => (issue.path.length ? `${issue.path.join(".")}: ${issue.message}` : issue.message))
            .join("; ");
        throw new MalformedPayloadError(`Unexpected /status payload: ${details}`);
    }
    return result.data;
}
