/**
 * Contract: Logger -- transport-based logging with pluggable handlers.
 *
 * Sections:
 *   1. Handler management
 *   2. Logging methods (debug, warn, error)
 *   3. Entry shape
 *   4. Console handler formatting
 */
import { describe, expect, it, vi } from "vitest";
import { colorizeValue, createConsoleHandler, formatEntry } from "./console-handler";
import { Logger } from "./logger";
import type { LogEntry } from "./types";

describe("Logger", () => {
    // -- 1. Handler management --
    describe("Handler management", () => {
        it("addHandler registers a handler that receives entries", () => {
            const logger = new Logger();
            const handler = vi.fn();
            logger.addHandler(handler);
            logger.debug("bus", "hello");
            expect(handler).toHaveBeenCalledOnce();
            expect(logger.handlerCount).toBe(1);
        });

        it("removeHandler stops the handler from receiving entries", () => {
            const logger = new Logger();
            const handler = vi.fn();
            logger.addHandler(handler);
            logger.removeHandler(handler);
            logger.debug("bus", "hello");
            expect(handler).not.toHaveBeenCalled();
            expect(logger.handlerCount).toBe(0);
        });

        it("fans out to multiple handlers", () => {
            const logger = new Logger();
            const a = vi.fn();
            const b = vi.fn();
            logger.addHandler(a);
            logger.addHandler(b);
            logger.warn("bus", "hello");
            expect(a).toHaveBeenCalledOnce();
            expect(b).toHaveBeenCalledOnce();
        });

        it("a handler removing another mid-fan-out does not skip it for the current entry", () => {
            const logger = new Logger();
            const second = vi.fn();
            logger.addHandler(() => logger.removeHandler(second));
            logger.addHandler(second);
            logger.debug("bus", "first");
            logger.debug("bus", "second");
            expect(second).toHaveBeenCalledOnce();
        });

        it("a throwing handler is reported and does not stop the others", () => {
            const spy = vi.spyOn(console, "error").mockImplementation(() => {});
            const logger = new Logger();
            const sinkError = new Error("sink down");
            const after = vi.fn();
            logger.addHandler(() => {
                throw sinkError;
            });
            logger.addHandler(after);

            expect(() => logger.warn("bus", "hello")).not.toThrow();
            expect(after).toHaveBeenCalledOnce();
            expect(spy).toHaveBeenCalledWith('[typebus] log handler failed on "bus → hello":', sinkError);
            spy.mockRestore();
        });

        it("no handlers means no error (silent)", () => {
            const logger = new Logger();
            expect(() => logger.error("bus", "hello")).not.toThrow();
        });
    });

    // -- 2. Logging methods --
    describe("Logging methods", () => {
        it.each(["debug", "warn", "error"] as const)("%s() emits entry with that level", (level) => {
            const logger = new Logger();
            const handler = vi.fn();
            logger.addHandler(handler);
            logger[level]("orders", "changed");
            expect(handler).toHaveBeenCalledWith(expect.objectContaining({ level, code: "orders", message: "changed" }));
        });
    });

    // -- 3. Entry shape --
    describe("Entry shape", () => {
        function capture(log: (logger: Logger) => void): LogEntry | undefined {
            const logger = new Logger();
            let captured: LogEntry | undefined;
            logger.addHandler((entry) => {
                captured = entry;
            });
            log(logger);
            return captured;
        }

        it("includes timestamp as a positive number", () => {
            const entry = capture((logger) => logger.debug("bus", "msg"));
            expect(typeof entry?.timestamp).toBe("number");
            expect(entry?.timestamp).toBeGreaterThan(0);
        });

        it("details is undefined when not provided", () => {
            const entry = capture((logger) => logger.debug("bus", "msg"));
            expect(entry).toBeDefined();
            expect(entry?.details).toBeUndefined();
        });

        it("details is passed through when provided", () => {
            const entry = capture((logger) => logger.error("bus", "msg", { event: "tick" }));
            expect(entry?.details).toEqual({ event: "tick" });
        });
    });

    // -- 4. Console handler --
    describe("Console handler (createConsoleHandler)", () => {
        it("logs debug to console.log with the library tag", () => {
            const spy = vi.spyOn(console, "log").mockImplementation(() => {});
            createConsoleHandler()({ level: "debug", code: "event-bus", message: "subscribed", timestamp: 0 });
            expect(spy).toHaveBeenCalledOnce();
            expect(spy.mock.calls[0]?.[0]).toMatch(/^\d{2}:\d{2}:\d{2} \[typebus\] event-bus → subscribed$/);
            spy.mockRestore();
        });

        it("logs warn to console.warn", () => {
            const spy = vi.spyOn(console, "warn").mockImplementation(() => {});
            createConsoleHandler()({ level: "warn", code: "event-bus", message: "duplicate", timestamp: 0 });
            expect(spy).toHaveBeenCalledOnce();
            expect(spy.mock.calls[0]?.[0]).toContain("[warn] event-bus → duplicate");
            spy.mockRestore();
        });

        it("logs error to console.error with colorized details", () => {
            const spy = vi.spyOn(console, "error").mockImplementation(() => {});
            createConsoleHandler()({
                level: "error",
                code: "event-bus",
                message: "handler failed",
                details: { index: 2 },
                timestamp: 0,
            });
            expect(spy).toHaveBeenCalledOnce();
            expect(spy.mock.calls[0]?.[0]).toContain(`[error] event-bus → handler failed ${colorizeValue({ index: 2 })}`);
            spy.mockRestore();
        });

        it("formatEntry renders level tag, code, message and details", () => {
            const line = formatEntry({ level: "warn", code: "hud", message: "slow", details: { ms: 40 }, timestamp: 0 });
            expect(line).toMatch(/^\d{2}:\d{2}:\d{2} \[warn\] hud → slow /);
            expect(line.endsWith(colorizeValue({ ms: 40 }))).toBe(true);
        });

        it("colorizes primitives and errors", () => {
            expect(colorizeValue("x")).toBe('\x1b[32m"x"\x1b[0m');
            expect(colorizeValue(3)).toBe("\x1b[33m3\x1b[0m");
            expect(colorizeValue(null)).toBe("\x1b[35mnull\x1b[0m");
            expect(colorizeValue(new TypeError("bad"))).toBe("\x1b[31mTypeError: bad\x1b[0m");
            expect(colorizeValue([])).toBe("[]");
            expect(colorizeValue({})).toBe("{}");
        });
    });
});
