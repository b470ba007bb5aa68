import { createRequire } from "node:module";

import pino, { type DestinationStream, type Logger, type LoggerOptions } from "pino";

export type LogFormat = "pretty" | "json";
export type LogDestination = "stdout" | "stderr" | string;

export type LogConfig = {
    level: string;
    format: LogFormat;
    destination: LogDestination;
    redact: string[];
    service: string;
    environment: string;
};

const DEFAULT_REDACT = ["token", "password", "secret", "*.token", "*.password", "*.secret"];

const nodeRequire = createRequire(import.meta.url);

let rootLogger: Logger | null = null;

const MODULE_WIDTH = 16;
const ANSI_RESET = "\u001b[0m";
const MODULE_COLORS = [196, 208, 220, 154, 82, 50, 45, 33, 57, 129, 165, 201, 141, 105, 69] as const;
const PRETTY_RESERVED_FIELDS = new Set([
    "pid",
    "hostname",
    "level",
    "time",
    "timestamp",
    "__time",
    "__level",
    "service",
    "environment",
    "module",
    "msg"
]);
const moduleColorCache = new Map<string, string>();

export function initLogging(overrides: Partial<LogConfig> = {}): Logger {
    if (rootLogger) {
        return rootLogger;
    }

    const config = resolveLogConfig(overrides);
    rootLogger = buildLogger(config);
    return rootLogger;
}

export function getLogger(moduleName?: string): Logger {
    const logger = rootLogger ?? initLogging();
    return logger.child({ module: normalizeModule(moduleName) });
}

export function resetLogging(): void {
    rootLogger = null;
}

export function resolveLogConfig(overrides: Partial<LogConfig> = {}): LogConfig {
    const isDev = process.env.NODE_ENV !== "production";
    const level =
        overrides.level ??
        envValue("PARLEY_LOG_LEVEL") ??
        envValue("LOG_LEVEL") ??
        (isUnitTestRun() ? "silent" : isDev ? "debug" : "info");
    const destination = overrides.destination ?? envValue("PARLEY_LOG_DEST") ?? envValue("LOG_DEST") ?? "stdout";
    const forceJson = parseBooleanFlag(envValue("PARLEY_LOG_JSON")) ?? parseBooleanFlag(envValue("LOG_JSON")) ?? false;
    let format =
        overrides.format ??
        parseFormat(envValue("PARLEY_LOG_FORMAT")) ??
        parseFormat(envValue("LOG_FORMAT")) ??
        (forceJson ? "json" : "pretty");
    const service = overrides.service ?? envValue("PARLEY_LOG_SERVICE") ?? "parley";
    const environment = overrides.environment ?? envValue("NODE_ENV") ?? "development";

    if (!isStdDestination(destination)) {
        format = "json";
    }

    const redact = overrides.redact ?? mergeRedactList(DEFAULT_REDACT, envValue("PARLEY_LOG_REDACT"));

    return {
        level,
        format,
        destination,
        redact,
        service,
        environment
    };
}

function buildLogger(config: LogConfig): Logger {
    const options: LoggerOptions = {
        level: config.level,
        timestamp: pino.stdTimeFunctions.isoTime,
        base: {
            service: config.service,
            environment: config.environment
        },
        redact: config.redact.length > 0 ? { paths: config.redact, censor: "[REDACTED]" } : undefined,
        errorKey: "error",
        serializers: {
            error: pino.stdSerializers.err
        }
    };

    if (config.format === "pretty") {
        const prettyFactory = resolvePrettyFactory();
        if (prettyFactory) {
            const prettyStream = prettyFactory({
                colorize: true,
                translateTime: false,
                ignore: "pid,hostname,level,service,environment,module",
                hideObject: true,
                messageFormat: formatPrettyMessage,
                singleLine: true,
                destination: config.destination === "stderr" ? 2 : 1
            });
            return pino(options, prettyStream);
        }
    }

    const destination = resolveDestination(config.destination);
    return destination ? pino(options, destination) : pino(options);
}

/**
 * Renders one log record as `[hh:mm:ss] [module] message key=value`.
 * Expects: messageKey names the field pino stores the message under.
 */
export function formatPrettyMessage(
    log: Record<string, unknown>,
    messageKey: string,
    _levelLabel?: string,
    extra?: { colors?: { gray?: (value: string) => string; yellow?: (value: string) => string } }
): string {
    const colors = extra?.colors;
    const colorTime = colors?.gray ?? ((value: string) => value);
    const colorMessage = log.level === 40 && colors?.yellow ? colors.yellow : (value: string) => value;
    const time = formatLogTime(log.time ?? log.timestamp ?? Date.now());
    const rawModule = normalizeModule(typeof log.module === "string" ? log.module : undefined);
    const label = `[${normalizeModuleName(rawModule)}]`;
    const moduleLabel = colors && !process.env.NO_COLOR ? `${moduleColor(rawModule)}${label}${ANSI_RESET}` : label;
    const messageValue = log[messageKey];
    const message = messageValue === undefined || messageValue === null ? "" : String(messageValue);
    const details = formatPrettyDetails(log, messageKey, message);
    const body = [message, details].filter((part) => part.length > 0).join(" ");
    return `${colorTime(`[${time}]`)} ${colorMessage(body.length > 0 ? `${moduleLabel} ${body}` : moduleLabel)}`;
}

function normalizeModule(moduleName?: string): string {
    if (typeof moduleName !== "string") {
        return "unknown";
    }
    const trimmed = moduleName.trim();
    return trimmed.length > 0 ? trimmed : "unknown";
}

function moduleColor(moduleName: string): string {
    const cached = moduleColorCache.get(moduleName);
    if (cached) {
        return cached;
    }
    let hash = 0;
    for (let index = 0; index < moduleName.length; index += 1) {
        hash = Math.imul(hash ^ moduleName.charCodeAt(index), 0x85ebca6b) >>> 0;
    }
    const color = `\u001b[38;5;${MODULE_COLORS[hash % MODULE_COLORS.length]}m`;
    moduleColorCache.set(moduleName, color);
    return color;
}

function formatPrettyDetails(log: Record<string, unknown>, messageKey: string, message: string): string {
    const details: string[] = [];
    for (const [key, value] of Object.entries(log)) {
        if (key === messageKey || PRETTY_RESERVED_FIELDS.has(key) || value === undefined) {
            continue;
        }
        if (message.includes(`${key}=`)) {
            continue;
        }
        details.push(`${key}=${formatPrettyDetailValue(key, value)}`);
    }
    return details.join(" ");
}

function formatPrettyDetailValue(key: string, value: unknown): string {
    if (value === null) {
        return "null";
    }
    if (typeof value === "number" || typeof value === "boolean" || typeof value === "bigint") {
        return String(value);
    }
    if (typeof value === "string") {
        return formatPrettyTextValue(value);
    }
    if (key === "error" || value instanceof Error) {
        return formatPrettyErrorValue(value);
    }
    if (Array.isArray(value)) {
        return formatPrettyTextValue(value.map((item) => String(item)).join(","));
    }
    try {
        return formatPrettyTextValue(JSON.stringify(value));
    } catch {
        return formatPrettyTextValue(String(value));
    }
}

function formatPrettyErrorValue(value: unknown): string {
    if (value instanceof Error) {
        return formatPrettyTextValue(`${value.name}:${value.message}`);
    }
    if (typeof value === "object" && value !== null) {
        const type = "type" in value && typeof value.type === "string" ? value.type : null;
        const message = "message" in value && typeof value.message === "string" ? value.message : null;
        const parts = [type, message].filter((item): item is string => item !== null);
        if (parts.length > 0) {
            return formatPrettyTextValue(parts.join(":"));
        }
    }
    return formatPrettyTextValue(String(value));
}

function formatPrettyTextValue(value: string): string {
    const truncated = value.length > 180 ? `${value.slice(0, 180)}...` : value;
    if (truncated.trim().length === 0) {
        return '""';
    }
    if (/[=\s]/.test(truncated)) {
        return JSON.stringify(truncated);
    }
    return truncated;
}

function normalizeModuleName(value: string): string {
    if (value.length >= MODULE_WIDTH) {
        return value.slice(0, MODULE_WIDTH);
    }
    return value.padEnd(MODULE_WIDTH, " ");
}

function formatLogTime(value: unknown): string {
    let date =
        value instanceof Date
            ? value
            : new Date(typeof value === "number" || typeof value === "string" ? value : Date.now());
    if (Number.isNaN(date.getTime())) {
        date = new Date();
    }
    return [date.getHours(), date.getMinutes(), date.getSeconds()].map((part) => String(part).padStart(2, "0")).join(":");
}

function resolveDestination(destination: LogDestination): DestinationStream | undefined {
    if (destination === "stdout") {
        return undefined;
    }
    if (destination === "stderr") {
        return pino.destination(2);
    }
    return pino.destination({ dest: destination, mkdir: true, sync: false });
}

function resolvePrettyFactory(): ((options: Record<string, unknown>) => DestinationStream) | null {
    try {
        return nodeRequire("pino-pretty");
    } catch {
        return null;
    }
}

function parseFormat(value: string | null): LogFormat | null {
    if (!value) {
        return null;
    }
    const normalized = value.toLowerCase().trim();
    return normalized === "pretty" || normalized === "json" ? normalized : null;
}

function parseBooleanFlag(value: string | null): boolean | null {
    if (!value) {
        return null;
    }
    const normalized = value.trim().toLowerCase();
    if (normalized === "1" || normalized === "true" || normalized === "yes" || normalized === "on") {
        return true;
    }
    if (normalized === "0" || normalized === "false" || normalized === "no" || normalized === "off") {
        return false;
    }
    return null;
}

function envValue(key: string): string | null {
    const value = process.env[key];
    if (typeof value !== "string") {
        return null;
    }
    const trimmed = value.trim();
    return trimmed.length > 0 ? trimmed : null;
}

function mergeRedactList(base: string[], extra: string | null): string[] {
    if (!extra) {
        return [...base];
    }
    const additions = extra
        .split(",")
        .map((entry) => entry.trim())
        .filter(Boolean);
    return [...new Set([...base, ...additions])];
}

function isStdDestination(destination: LogDestination): boolean {
    return destination === "stdout" || destination === "stderr";
}

function isUnitTestRun(): boolean {
    return process.env.VITEST === "true" || process.env.VITEST === "1";
}
