import {BinlogDecodeError} from "../BinlogDecodeError";
import {BinlogCursor} from "../codec/BinlogCursor";
import {ChecksumAlgorithm, FormatDescription} from "../model/FormatDescription";

const SERVER_VERSION_LENGTH = 50;

/**
 * binlog version(2) + server version(50) + create timestamp(4) + header length(1)
 */
const FIXED_PART_LENGTH = 2 + SERVER_VERSION_LENGTH + 4 + 1;

/**
 * checksum algorithm(1) + checksum value(4)
 */
const CHECKSUM_TRAILER_LENGTH = 1 + 4;

const VERSION_MATCHER = /^(\d+)\.(\d+)\.(\d+)/;

/**
 * Whether a server of this version writes the checksum algorithm at the end
 * of its format description.  Checksums arrived in MySQL 5.6.1 and MariaDB 5.3.
 * Versions that can't be parsed are assumed to be recent.
 */
export function serverVersionSupportsChecksum(serverVersion: string): boolean {
    const match = VERSION_MATCHER.exec(serverVersion);
    if (!match) {
        return true;
    }
    const version = [+match[1], +match[2], +match[3]];
    const since = serverVersion.includes("MariaDB") ? [5, 3, 0] : [5, 6, 1];
    for (let i = 0; i < version.length; i++) {
        if (version[i] !== since[i]) {
            return version[i] > since[i];
        }
    }
    return true;
}

function readServerVersion(body: Buffer): string {
    const cursor = new BinlogCursor(body, 2);
    return cursor.bytesOf(SERVER_VERSION_LENGTH).toString("utf8").replace(/\0+$/, "");
}

function toChecksumAlgorithm(value: number): ChecksumAlgorithm {
    switch (value) {
        case ChecksumAlgorithm.Off:
            return ChecksumAlgorithm.Off;
        case ChecksumAlgorithm.Crc32:
            return ChecksumAlgorithm.Crc32;
        case ChecksumAlgorithm.Undefined:
            return ChecksumAlgorithm.Undefined;
        default:
            throw new BinlogDecodeError("MalformedBody", `Unknown binlog checksum algorithm ${value}.`);
    }
}

/**
 * Reads the checksum algorithm a format description body declares for itself
 * and every event after it.  The body still includes any checksum.
 */
export function getFormatDescriptionChecksumAlgorithm(body: Buffer): ChecksumAlgorithm {
    if (!serverVersionSupportsChecksum(readServerVersion(body))) {
        return ChecksumAlgorithm.Undefined;
    }
    if (body.length < FIXED_PART_LENGTH + CHECKSUM_TRAILER_LENGTH) {
        throw new BinlogDecodeError("Truncated", `Format description of ${body.length} bytes is too short to hold a checksum algorithm.`);
    }
    return toChecksumAlgorithm(body[body.length - CHECKSUM_TRAILER_LENGTH]);
}

/**
 * @param body The validated body.
 * @param checksumRemoved Whether validation already split off the trailing checksum value.
 */
export function decodeFormatDescription(body: Buffer, checksumRemoved: boolean): FormatDescription {
    const cursor = new BinlogCursor(body);
    const binlogVersion = cursor.uint16();
    const serverVersion = cursor.bytesOf(SERVER_VERSION_LENGTH).toString("utf8").replace(/\0+$/, "");
    const createTimestamp = cursor.uint32();
    const headerLength = cursor.uint8();

    let checksumAlgorithm = ChecksumAlgorithm.Undefined;
    let tableEnd = body.length;
    if (serverVersionSupportsChecksum(serverVersion)) {
        const trailerLength = checksumRemoved ? 1 : CHECKSUM_TRAILER_LENGTH;
        tableEnd = body.length - trailerLength;
        if (tableEnd < cursor.offset) {
            throw new BinlogDecodeError("Truncated", `Format description of ${body.length} bytes is too short to hold a checksum algorithm.`);
        }
        checksumAlgorithm = toChecksumAlgorithm(body[tableEnd]);
    }

    return {
        kind: "formatDescription",
        binlogVersion,
        serverVersion,
        createTimestamp,
        headerLength,
        eventTypeHeaderLengths: cursor.bytesOf(tableEnd - cursor.offset),
        checksumAlgorithm,
        checksumEnabled: checksumAlgorithm === ChecksumAlgorithm.Crc32
    };
}
