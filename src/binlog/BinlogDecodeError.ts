import {BinlogEventHeader} from "./model/BinlogEventHeader";

/**
 * Raised by every stage of binlog decoding.  Check `fatal` before deciding
 * whether the decoder that threw can be used again.
 */
export class BinlogDecodeError extends Error {

    readonly isBinlogDecodeError = true;

    constructor(readonly code: BinlogDecodeError.Code, message: string, readonly header?: BinlogEventHeader) {
        super(message);
        this.name = "BinlogDecodeError";
    }

    /**
     * Fatal errors leave the byte position of the stream untrustworthy.
     * Recoverable errors are raised after the whole event was consumed.
     */
    get fatal(): boolean {
        return !BinlogDecodeError.recoverableCodes.includes(this.code);
    }

    static isBinlogDecodeError(err: unknown): err is BinlogDecodeError {
        return typeof err === "object" && err !== null && "isBinlogDecodeError" in err && err.isBinlogDecodeError === true;
    }

    static hasCode(err: unknown, code: BinlogDecodeError.Code): err is BinlogDecodeError {
        return BinlogDecodeError.isBinlogDecodeError(err) && err.code === code;
    }
}

export namespace BinlogDecodeError {
    export type Code =
        "InvalidFileHeader"
        | "Truncated"
        | "InvalidHeader"
        | "SizeMismatch"
        | "ChecksumMismatch"
        | "UnknownEventType"
        | "MalformedBody"
        | "UnknownTable"
        | "UnknownStatusVar"
        | "InvalidOptions";

    export const recoverableCodes: readonly Code[] = ["UnknownTable", "UnknownStatusVar"];
}
