/**
 * A sequential source of bytes for a BinlogFileDecoder.
 */
export interface ByteSource {

    /**
     * Resolves exactly `length` bytes, or null when the source was already
     * exhausted.  Rejects with a Truncated BinlogDecodeError when only some
     * of the bytes are left.
     */
    readExactly(length: number): Promise<Buffer | null>;

    close(): Promise<void>;
}
