import type { LoggerContext } from "../types";
import type { LogEntry, LogHandler } from "./types";

export class Logger implements LoggerContext {
    private readonly handlers: Set<LogHandler> = new Set();

    addHandler(handler: LogHandler): void {
        this.handlers.add(handler);
    }

    removeHandler(handler: LogHandler): void {
        this.handlers.delete(handler);
    }

    get handlerCount(): number {
        return this.handlers.size;
    }

    debug(code: string, message: string, details?: Record<string, unknown>): void {
        this.emit("debug", code, message, details);
    }

    warn(code: string, message: string, details?: Record<string, unknown>): void {
        this.emit("warn", code, message, details);
    }

    error(code: string, message: string, details?: Record<string, unknown>): void {
        this.emit("error", code, message, details);
    }

    private emit(
        level: LogEntry["level"],
        code: string,
        message: string,
        details?: Record<string, unknown>,
    ): void {
        if (this.handlers.size === 0) return;
        const entry: LogEntry = { level, code, message, details, timestamp: Date.now() };
        // Copy so a handler may add or remove handlers while we fan out.
        for (const handler of [...this.handlers]) {
            try {
                handler(entry);
            } catch (err) {
                // A broken sink must not undo or mask the operation being logged.
                console.error(`[typebus] log handler failed on "${entry.code} → ${entry.message}":`, err);
            }
        }
    }
}
