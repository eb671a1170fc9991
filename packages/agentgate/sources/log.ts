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
};

type PrettyFactory = (options: Record<string, unknown>) => DestinationStream;

const DEFAULT_REDACT = ["token", "botToken", "*.token", "*.botToken", "telegramToken", "*.telegramToken"];
const MODULE_WIDTH = 16;
const PRETTY_RESERVED_FIELDS = new Set(["pid", "hostname", "level", "time", "service", "module", "msg"]);
const nodeRequire = createRequire(import.meta.url);

let rootLogger: Logger | null = null;

export function initLogging(overrides: Partial<LogConfig> = {}): Logger {
    if (rootLogger) {
        return rootLogger;
    }
    rootLogger = buildLogger(resolveLogConfig(overrides));
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
    const level =
        overrides.level ??
        envValue("AGENTGATE_LOG_LEVEL") ??
        envValue("LOG_LEVEL") ??
        (isUnitTestRun() ? "silent" : process.env.NODE_ENV === "production" ? "info" : "debug");
    const destination = overrides.destination ?? envValue("AGENTGATE_LOG_DEST") ?? envValue("LOG_DEST") ?? "stdout";
    const forceJson = parseBooleanFlag(envValue("AGENTGATE_LOG_JSON") ?? envValue("LOG_JSON")) ?? false;
    let format =
        overrides.format ??
        parseFormat(envValue("AGENTGATE_LOG_FORMAT") ?? envValue("LOG_FORMAT")) ??
        (forceJson ? "json" : "pretty");
    if (destination !== "stdout" && destination !== "stderr") {
        format = "json";
    }

    return {
        level,
        format,
        destination,
        redact: overrides.redact ?? mergeRedactList(DEFAULT_REDACT, envValue("AGENTGATE_LOG_REDACT")),
        service: overrides.service ?? "agentgate"
    };
}

function buildLogger(config: LogConfig): Logger {
    const options: LoggerOptions = {
        level: config.level,
        timestamp: pino.stdTimeFunctions.isoTime,
        base: { service: config.service },
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
                ignore: "pid,hostname,level,service,module",
                hideObject: true,
                messageFormat: formatPrettyMessage,
                destination: config.destination === "stderr" ? 2 : 1
            });
            return pino(options, prettyStream);
        }
    }

    const destination = resolveDestination(config.destination);
    return destination ? pino(options, destination) : pino(options);
}

/**
 * Renders one pretty log line as `[module] message key=value`.
 * Expects: log is a pino record; fields already present in the message are not repeated.
 */
export function formatPrettyMessage(log: Record<string, unknown>, messageKey: string): string {
    const module = `[${normalizeModule(typeof log.module === "string" ? log.module : undefined).padEnd(MODULE_WIDTH)}]`;
    const messageValue = log[messageKey];
    const message = messageValue === undefined || messageValue === null ? "" : String(messageValue);
    const details: string[] = [];
    for (const [key, value] of Object.entries(log)) {
        if (key === messageKey || PRETTY_RESERVED_FIELDS.has(key) || value === undefined) {
            continue;
        }
        if (message.includes(`${key}=`)) {
            continue;
        }
        details.push(`${key}=${formatDetailValue(key, value)}`);
    }
    return [module, message, ...details].filter((part) => part.length > 0).join(" ");
}

function formatDetailValue(key: string, value: unknown): string {
    if (value === null) {
        return "null";
    }
    if (typeof value === "string") {
        return formatTextValue(value);
    }
    if (typeof value === "number" || typeof value === "boolean" || typeof value === "bigint") {
        return String(value);
    }
    if (value instanceof Error) {
        return formatTextValue(value.message);
    }
    if (key === "error" && typeof value === "object" && "message" in value && typeof value.message === "string") {
        return formatTextValue(value.message);
    }
    if (Array.isArray(value)) {
        return formatTextValue(value.join(","));
    }
    try {
        return formatTextValue(JSON.stringify(value));
    } catch {
        return formatTextValue(String(value));
    }
}

function formatTextValue(value: string): string {
    const truncated = value.length > 180 ? `${value.slice(0, 180)}...` : value;
    if (truncated.trim().length === 0) {
        return '""';
    }
    return /[=\s]/.test(truncated) ? JSON.stringify(truncated) : truncated;
}

function normalizeModule(moduleName?: string): string {
    const trimmed = moduleName?.trim() ?? "";
    return trimmed.length > 0 ? trimmed : "unknown";
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

function resolvePrettyFactory(): PrettyFactory | null {
    try {
        return nodeRequire("pino-pretty");
    } catch {
        return null;
    }
}

function parseFormat(value: string | null): LogFormat | null {
    const normalized = value?.toLowerCase();
    if (normalized === "pretty" || normalized === "json") {
        return normalized;
    }
    return null;
}

function parseBooleanFlag(value: string | null): boolean | null {
    if (!value) {
        return null;
    }
    const normalized = value.toLowerCase();
    if (["1", "true", "yes", "on"].includes(normalized)) {
        return true;
    }
    if (["0", "false", "no", "off"].includes(normalized)) {
        return false;
    }
    return null;
}

function envValue(key: string): string | null {
    const trimmed = process.env[key]?.trim();
    return trimmed ? trimmed : null;
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

function isUnitTestRun(): boolean {
    return process.env.VITEST === "true" || process.env.VITEST === "1";
}
