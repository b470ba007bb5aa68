import { configSettingsParse } from "./configSettingsParse.js";
import type { Config } from "./configTypes.js";

export const CONFIG_DEFAULTS: Config = {
    meetings: {
        quorumTimeoutMs: 30_000,
        historyLimit: 500,
        idStart: 100
    },
    waits: {
        fastWindowMs: 500,
        batchWindowMs: 5_000,
        defaultTimeoutMs: 60_000
    }
};

/**
 * Resolves runtime config from raw settings, filling defaults for anything unset.
 */
export function configResolve(settings: unknown = {}): Config {
    const parsed = configSettingsParse(settings);
    const config: Config = {
        meetings: { ...CONFIG_DEFAULTS.meetings, ...parsed.meetings },
        waits: { ...CONFIG_DEFAULTS.waits, ...parsed.waits }
    };
    if (config.waits.fastWindowMs > config.waits.batchWindowMs) {
        throw new Error("waits.fastWindowMs must not exceed waits.batchWindowMs");
    }
    return config;
}
