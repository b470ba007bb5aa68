import { afterEach, describe, expect, it } from "vitest";

import { formatPrettyMessage, initLogging, resetLogging, resolveLogConfig } from "./log.js";

const ENV_KEYS = [
    "VITEST",
    "PARLEY_LOG_LEVEL",
    "LOG_LEVEL",
    "PARLEY_LOG_FORMAT",
    "LOG_FORMAT",
    "PARLEY_LOG_JSON",
    "LOG_JSON"
] as const;
const savedEnv = new Map(ENV_KEYS.map((key) => [key, process.env[key]]));

afterEach(() => {
    resetLogging();
    for (const [key, value] of savedEnv) {
        if (value === undefined) {
            delete process.env[key];
        } else {
            process.env[key] = value;
        }
    }
});

describe("initLogging", () => {
    it("defaults to silent level when running in vitest", () => {
        process.env.VITEST = "true";
        delete process.env.PARLEY_LOG_LEVEL;
        delete process.env.LOG_LEVEL;

        resetLogging();
        const logger = initLogging();

        expect(logger.level).toBe("silent");
    });

    it("prefers PARLEY_LOG_LEVEL over LOG_LEVEL", () => {
        process.env.PARLEY_LOG_LEVEL = "warn";
        process.env.LOG_LEVEL = "debug";

        expect(resolveLogConfig().level).toBe("warn");
    });
});

describe("resolveLogConfig", () => {
    it("defaults to pretty format", () => {
        delete process.env.PARLEY_LOG_FORMAT;
        delete process.env.LOG_FORMAT;
        delete process.env.PARLEY_LOG_JSON;
        delete process.env.LOG_JSON;

        const config = resolveLogConfig({ destination: "stdout" });
        expect(config.format).toBe("pretty");
    });

    it("uses json format when PARLEY_LOG_JSON is enabled", () => {
        delete process.env.PARLEY_LOG_FORMAT;
        delete process.env.LOG_FORMAT;
        process.env.PARLEY_LOG_JSON = "1";

        const config = resolveLogConfig({ destination: "stdout" });
        expect(config.format).toBe("json");
    });

    it("forces json format for file destinations", () => {
        const config = resolveLogConfig({ destination: "/tmp/parley.log", format: "pretty" });
        expect(config.format).toBe("json");
    });
});

describe("formatPrettyMessage", () => {
    it("includes structured fields in pretty text output", () => {
        const output = formatPrettyMessage(
            {
                time: "2026-01-02T03:04:05.000Z",
                level: 30,
                module: "router",
                msg: "event: Message routed",
                channelId: "direct:agent:1000|agent:1001",
                delivered: 1
            },
            "msg"
        );

        expect(output).toMatch(
            /^\[\d{2}:\d{2}:\d{2}\] \[router {10}\] event: Message routed channelId=direct:agent:1000\|agent:1001 delivered=1$/
        );
    });

    it("does not duplicate keys already present in the message", () => {
        const output = formatPrettyMessage(
            {
                time: "2026-01-02T03:04:05.000Z",
                level: 30,
                module: "meetings",
                msg: "event: Meeting started meetingId=100",
                meetingId: "100",
                joined: 3
            },
            "msg"
        );

        expect(output.endsWith("event: Meeting started meetingId=100 joined=3")).toBe(true);
    });

    it("summarizes serialized errors", () => {
        const output = formatPrettyMessage(
            {
                time: "2026-01-02T03:04:05.000Z",
                level: 50,
                module: "channel",
                msg: "error: Delivery failed",
                error: { type: "DeliveryFailureError", message: "inbox closed" }
            },
            "msg"
        );

        expect(output.endsWith('error: Delivery failed error="DeliveryFailureError:inbox closed"')).toBe(true);
    });
});
