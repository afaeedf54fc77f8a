import type { LogEntry, LogHandler, LogLevel } from "./types";

const ansi = {
    dim: "\x1b[90m",
    red: "\x1b[31m",
    green: "\x1b[32m",
    yellow: "\x1b[33m",
    magenta: "\x1b[35m",
    cyan: "\x1b[36m",
    reset: "\x1b[0m",
} as const;

const paint = (color: keyof typeof ansi, text: string): string => `${ansi[color]}${text}${ansi.reset}`;

const LEVEL_TAG: Record<LogLevel, string> = {
    debug: "typebus",
    warn: "warn",
    error: "error",
};

const LEVEL_SINK: Record<LogLevel, (line: string) => void> = {
    debug: (line) => console.log(line),
    warn: (line) => console.warn(line),
    error: (line) => console.error(line),
};

function formatTime(ts: number): string {
    const d = new Date(ts);
    return [d.getHours(), d.getMinutes(), d.getSeconds()].map((n) => String(n).padStart(2, "0")).join(":");
}

/** Render a log detail value; handler errors show as `Name: message`. */
export function colorizeValue(value: unknown): string {
    if (value === null) return paint("magenta", "null");
    if (value === undefined) return paint("dim", "undefined");
    if (typeof value === "string") return paint("green", `"${value}"`);
    if (typeof value === "number" || typeof value === "boolean") return paint("yellow", String(value));
    if (value instanceof Error) return paint("red", `${value.name}: ${value.message}`);

    const comma = `${paint("dim", ",")} `;
    if (Array.isArray(value)) {
        return value.length === 0 ? "[]" : `[${value.map(colorizeValue).join(comma)}]`;
    }
    if (typeof value === "object") {
        const pairs = Object.entries(value).map(([k, v]) => `${paint("cyan", k)}${paint("dim", ":")} ${colorizeValue(v)}`);
        return pairs.length === 0 ? "{}" : `${paint("dim", "{")} ${pairs.join(comma)} ${paint("dim", "}")}`;
    }
    return String(value);
}

/** `HH:MM:SS [tag] code → message {details}` */
export function formatEntry(entry: LogEntry): string {
    const details = entry.details ? ` ${colorizeValue(entry.details)}` : "";
    return `${formatTime(entry.timestamp)} [${LEVEL_TAG[entry.level]}] ${entry.code} → ${entry.message}${details}`;
}

export function createConsoleHandler(): LogHandler {
    return (entry) => LEVEL_SINK[entry.level](formatEntry(entry));
}
