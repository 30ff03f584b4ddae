import * as fs from "fs";
import {BinlogDecodeError} from "../BinlogDecodeError";
import {ByteSource} from "./ByteSource";
import log = require("loglevel");

const DEFAULT_CHUNK_SIZE = 64 * 1024;

/**
 * Reads a file front to back through a chunk sized buffer.
 */
export class FileByteSource implements ByteSource {

    private buffer: Buffer = Buffer.alloc(0);
    private filePosition = 0;
    private endOfFile = false;

    private constructor(readonly path: string, private fileHandle: fs.promises.FileHandle | null, private readonly chunkSize: number) {
    }

    static async open(path: string, chunkSize: number = DEFAULT_CHUNK_SIZE): Promise<FileByteSource> {
        const fileHandle = await fs.promises.open(path, "r");
        log.debug("FileByteSource opened", path);
        return new FileByteSource(path, fileHandle, chunkSize);
    }

    async readExactly(length: number): Promise<Buffer | null> {
        while (this.buffer.length < length && !this.endOfFile) {
            await this.fill(Math.max(this.chunkSize, length - this.buffer.length));
        }

        if (this.buffer.length === 0 && length > 0) {
            return null;
        }
        if (this.buffer.length < length) {
            const available = this.buffer.length;
            this.buffer = Buffer.alloc(0);
            throw new BinlogDecodeError("Truncated", `Wanted ${length} bytes from ${this.path} but only ${available} remain.`);
        }

        const bytes = this.buffer.subarray(0, length);
        this.buffer = this.buffer.subarray(length);
        return bytes;
    }

    async close(): Promise<void> {
        if (!this.fileHandle) {
            return;
        }
        await this.fileHandle.close();
        this.fileHandle = null;
        this.buffer = Buffer.alloc(0);
        this.endOfFile = true;
        log.debug("FileByteSource closed", this.path);
    }

    private async fill(size: number): Promise<void> {
        if (!this.fileHandle) {
            this.endOfFile = true;
            return;
        }
        const chunk = Buffer.alloc(size);
        const {bytesRead} = await this.fileHandle.read(chunk, 0, size, this.filePosition);
        if (bytesRead === 0) {
            this.endOfFile = true;
            return;
        }
        this.filePosition += bytesRead;
        this.buffer = Buffer.concat([this.buffer, chunk.subarray(0, bytesRead)]);
    }
}
