import {BinlogDecodeError} from "../BinlogDecodeError";
import {BinlogEventHeader} from "../model/BinlogEventHeader";

/**
 * Header length of binlog version 1 and 3 events, before log_pos and flags were added.
 */
export const LEGACY_EVENT_HEADER_LENGTH = 13;

/**
 * Header length from binlog version 4 (MySQL 5.0) onward.
 */
export const DEFAULT_EVENT_HEADER_LENGTH = 19;

export function decodeEventHeader(bytes: Buffer, headerWidth: number): BinlogEventHeader {
    if (headerWidth < LEGACY_EVENT_HEADER_LENGTH) {
        throw new BinlogDecodeError("InvalidHeader", `Invalid event header width ${headerWidth}, must be at least ${LEGACY_EVENT_HEADER_LENGTH}.`);
    }
    if (bytes.length < headerWidth) {
        throw new BinlogDecodeError("InvalidHeader", `Invalid event header size ${bytes.length}, should be ${headerWidth}.`);
    }

    const header: BinlogEventHeader = {
        timestamp: bytes.readUInt32LE(0),
        eventType: bytes.readUInt8(4),
        serverId: bytes.readUInt32LE(5),
        eventSize: bytes.readUInt32LE(9),
        logPos: 0,
        flags: 0
    };
    if (headerWidth > LEGACY_EVENT_HEADER_LENGTH) {
        header.logPos = bytes.readUInt32LE(13);
        header.flags = bytes.readUInt16LE(17);
    }
    return header;
}
