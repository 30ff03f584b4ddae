import * as jsonschema from "jsonschema";
import {BinlogDecodeError} from "./BinlogDecodeError";
import {BinlogEventHeader} from "./model/BinlogEventHeader";

/**
 * Limits which events a BinlogFileDecoder delivers.  All are optional and a
 * value of 0 is the same as leaving it out.  Delivery is the time range
 * [startTime, endTime).
 */
export interface BinlogReaderOptions {
    /**
     * Deliver events starting at or after this byte offset.
     */
    startPos?: number;

    /**
     * Stop at the first event that ends past this byte offset.
     */
    endPos?: number;

    /**
     * Deliver events with a timestamp at or after this.  Numbers are Unix seconds.
     */
    startTime?: Date | number;

    /**
     * Stop at the first event with a timestamp at or after this.  Numbers are Unix seconds.
     */
    endTime?: Date | number;
}

export namespace BinlogReaderOptions {

    /**
     * Options with times as Unix seconds and unset values as null.
     */
    export interface Normalized {
        startPos: number | null;
        endPos: number | null;
        startTime: number | null;
        endTime: number | null;
    }

    export const schema: jsonschema.Schema = {
        title: "BinlogReaderOptions",
        type: "object",
        properties: {
            startPos: {
                type: ["integer", "null"],
                minimum: 0
            },
            endPos: {
                type: ["integer", "null"],
                minimum: 0
            },
            startTime: {
                type: ["integer", "null"],
                minimum: 0
            },
            endTime: {
                type: ["integer", "null"],
                minimum: 0
            }
        },
        additionalProperties: false
    };

    /**
     * Validates and normalizes the options.  Fails with InvalidOptions.
     */
    export function normalize(options: BinlogReaderOptions = {}): Normalized {
        const normalized = {
            ...options,
            startPos: options.startPos || null,
            endPos: options.endPos || null,
            startTime: toUnixSeconds(options.startTime),
            endTime: toUnixSeconds(options.endTime)
        };

        const result = jsonschema.validate(normalized, schema);
        if (!result.valid) {
            throw new BinlogDecodeError("InvalidOptions", `Invalid binlog reader options: ${result.errors.map(e => e.stack).join(", ")}.`);
        }
        return {
            startPos: normalized.startPos,
            endPos: normalized.endPos,
            startTime: normalized.startTime,
            endTime: normalized.endTime
        };
    }

    /**
     * Reads options from BINLOG_START_POS, BINLOG_END_POS, BINLOG_START_TIME and
     * BINLOG_END_TIME.  Times are Unix seconds or anything Date.parse() understands.
     */
    export function fromEnv(env: NodeJS.ProcessEnv = process.env): BinlogReaderOptions {
        const options: BinlogReaderOptions = {};
        if (env["BINLOG_START_POS"]) {
            options.startPos = parseEnvNumber(env, "BINLOG_START_POS");
        }
        if (env["BINLOG_END_POS"]) {
            options.endPos = parseEnvNumber(env, "BINLOG_END_POS");
        }
        if (env["BINLOG_START_TIME"]) {
            options.startTime = parseEnvTime(env, "BINLOG_START_TIME");
        }
        if (env["BINLOG_END_TIME"]) {
            options.endTime = parseEnvTime(env, "BINLOG_END_TIME");
        }
        normalize(options);
        return options;
    }

    function toUnixSeconds(time: Date | number | undefined): number | null {
        if (time instanceof Date) {
            return time.getTime() === 0 ? null : Math.floor(time.getTime() / 1000);
        }
        return time || null;
    }

    function parseEnvNumber(env: NodeJS.ProcessEnv, name: string): number {
        const value = +(env[name] ?? "");
        if (isNaN(value)) {
            throw new BinlogDecodeError("InvalidOptions", `Environment variable '${name}' is not a number.`);
        }
        return value;
    }

    function parseEnvTime(env: NodeJS.ProcessEnv, name: string): Date | number {
        const raw = env[name] ?? "";
        if (/^\d+$/.test(raw)) {
            return +raw;
        }
        const date = new Date(raw);
        if (isNaN(date.getTime())) {
            throw new BinlogDecodeError("InvalidOptions", `Environment variable '${name}' is not a time.`);
        }
        return date;
    }
}

/**
 * Decides for each event header whether it is inside the configured window.
 * Once an event has started the window every later event is inside it too.
 */
export class BinlogEventWindow {

    private started: boolean;

    constructor(private readonly options: BinlogReaderOptions.Normalized) {
        this.started = options.startPos === null && options.startTime === null;
    }

    isStarted(header: BinlogEventHeader): boolean {
        if (!this.started) {
            this.started = (this.options.startPos !== null && BinlogEventHeader.getStartPosition(header) >= this.options.startPos)
                || (this.options.startTime !== null && header.timestamp >= this.options.startTime);
        }
        return this.started;
    }

    isStopped(header: BinlogEventHeader): boolean {
        return (this.options.endPos !== null && header.logPos > this.options.endPos)
            || (this.options.endTime !== null && header.timestamp >= this.options.endTime);
    }
}
