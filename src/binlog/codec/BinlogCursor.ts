import {BinlogDecodeError} from "../BinlogDecodeError";
import {assertAvailable, readFixedLengthInt, readPackedInt, readPackedString, toSafeNumber} from "./primitives";

/**
 * Reads a Buffer front to back.  Every read is bounds checked and fails with
 * a Truncated BinlogDecodeError rather than reading past the end.
 */
export class BinlogCursor {

    constructor(private readonly bytes: Buffer, public offset: number = 0) {
    }

    get remaining(): number {
        return this.bytes.length - this.offset;
    }

    uint8(): number {
        assertAvailable(this.bytes, this.offset, 1, "uint8");
        return this.bytes.readUInt8(this.offset++);
    }

    uint16(): number {
        assertAvailable(this.bytes, this.offset, 2, "uint16");
        const value = this.bytes.readUInt16LE(this.offset);
        this.offset += 2;
        return value;
    }

    uint24(): number {
        assertAvailable(this.bytes, this.offset, 3, "uint24");
        const value = this.bytes.readUIntLE(this.offset, 3);
        this.offset += 3;
        return value;
    }

    uint32(): number {
        assertAvailable(this.bytes, this.offset, 4, "uint32");
        const value = this.bytes.readUInt32LE(this.offset);
        this.offset += 4;
        return value;
    }

    uint64(): bigint {
        return this.fixedLengthInt(8);
    }

    fixedLengthInt(width: number): bigint {
        const value = readFixedLengthInt(this.bytes, this.offset, width);
        this.offset += width;
        return value;
    }

    /**
     * A packed int that must not be NULL and must fit in a number.
     */
    packedInt(what: string): number {
        const packed = readPackedInt(this.bytes, this.offset);
        this.offset += packed.length;
        if (packed.value === null) {
            throw new BinlogDecodeError("MalformedBody", `Expected ${what} but found NULL.`);
        }
        return toSafeNumber(packed.value, what);
    }

    packedString(): Buffer {
        const packed = readPackedString(this.bytes, this.offset);
        this.offset += packed.length;
        return packed.value;
    }

    bytesOf(length: number): Buffer {
        assertAvailable(this.bytes, this.offset, length, `${length} bytes`);
        const value = this.bytes.subarray(this.offset, this.offset + length);
        this.offset += length;
        return value;
    }

    string(length: number): string {
        return this.bytesOf(length).toString("utf8");
    }

    /**
     * A string ending at the next 0x00, which is consumed but not returned.
     */
    nulTerminatedString(): string {
        const end = this.bytes.indexOf(0, this.offset);
        if (end === -1) {
            throw new BinlogDecodeError("Truncated", `No string terminator after offset ${this.offset}.`);
        }
        const value = this.bytes.toString("utf8", this.offset, end);
        this.offset = end + 1;
        return value;
    }

    skip(length: number): void {
        assertAvailable(this.bytes, this.offset, length, `${length} skipped bytes`);
        this.offset += length;
    }

    /**
     * Everything after the current offset.
     */
    rest(): Buffer {
        const value = this.bytes.subarray(this.offset);
        this.offset = this.bytes.length;
        return value;
    }
}
