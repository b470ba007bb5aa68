import { z } from "zod";

import type { SettingsConfig } from "./configTypes.js";

const durationMs = z.number().int().nonnegative();

const settingsSchema = z
    .object({
        meetings: z
            .object({
                quorumTimeoutMs: durationMs.optional(),
                historyLimit: z.number().int().positive().optional(),
                idStart: z.number().int().nonnegative().optional()
            })
            .strict()
            .optional(),
        waits: z
            .object({
                fastWindowMs: durationMs.optional(),
                batchWindowMs: durationMs.optional(),
                defaultTimeoutMs: durationMs.optional()
            })
            .strict()
            .optional()
    })
    .strict();

/**
 * Parses raw settings data into validated SettingsConfig.
 * Expects: raw is JSON-compatible; unknown keys are rejected.
 */
export function configSettingsParse(raw: unknown): SettingsConfig {
    return settingsSchema.parse(raw ?? {});
}
