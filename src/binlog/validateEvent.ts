import {BinlogDecodeError} from "./BinlogDecodeError";
import {crc32} from "./codec/crc32";
import {BinlogEvent} from "./model/BinlogEvent";
import {ChecksumAlgorithm} from "./model/FormatDescription";

export const BINLOG_CHECKSUM_LENGTH = 4;

export interface ValidatedEvent {
    /**
     * The event body without any checksum.
     */
    body: Buffer;
    checksum: BinlogEvent.Checksum | null;
}

/**
 * Checks the framing of one event and, when the stream is checksummed,
 * splits off and verifies the trailing CRC-32.  The checksum covers the
 * header and everything in the body before it.
 */
export function validateEvent(headerBytes: Buffer, bodyBytes: Buffer, eventSize: number, checksumAlgorithm: ChecksumAlgorithm): ValidatedEvent {
    const size = headerBytes.length + bodyBytes.length;
    if (size !== eventSize) {
        throw new BinlogDecodeError("SizeMismatch", `Event size got ${size} need ${eventSize}.`);
    }

    if (checksumAlgorithm !== ChecksumAlgorithm.Crc32) {
        return {body: bodyBytes, checksum: null};
    }

    if (bodyBytes.length < BINLOG_CHECKSUM_LENGTH) {
        throw new BinlogDecodeError("Truncated", `Event body of ${bodyBytes.length} bytes is too short to hold a checksum.`);
    }
    const splitIx = bodyBytes.length - BINLOG_CHECKSUM_LENGTH;
    const body = bodyBytes.subarray(0, splitIx);
    const value = bodyBytes.subarray(splitIx);

    const expected = value.readUInt32LE(0);
    const actual = crc32(headerBytes, body);
    if (actual !== expected) {
        throw new BinlogDecodeError("ChecksumMismatch", `Binlog checksum validation failed, stored 0x${expected.toString(16)} computed 0x${actual.toString(16)}.`);
    }

    return {
        body,
        checksum: {
            algorithm: checksumAlgorithm,
            value
        }
    };
}
