import {BinlogDecodeError} from "../BinlogDecodeError";
import {ByteSource} from "./ByteSource";

/**
 * A ByteSource over bytes already in memory.
 */
export class BufferByteSource implements ByteSource {

    private offset = 0;

    constructor(private readonly buffer: Buffer) {
    }

    async readExactly(length: number): Promise<Buffer | null> {
        if (this.offset >= this.buffer.length && length > 0) {
            return null;
        }
        if (this.offset + length > this.buffer.length) {
            const available = this.buffer.length - this.offset;
            this.offset = this.buffer.length;
            throw new BinlogDecodeError("Truncated", `Wanted ${length} bytes but only ${available} remain.`);
        }
        const bytes = this.buffer.subarray(this.offset, this.offset + length);
        this.offset += length;
        return bytes;
    }

    async close(): Promise<void> {
        this.offset = this.buffer.length;
    }
}
