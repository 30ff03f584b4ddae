import {EventType} from "./EventType";

/**
 * The common header at the start of every event.
 * @see https://dev.mysql.com/doc/internals/en/binlog-event-header.html
 */
export interface BinlogEventHeader {
    /**
     * Seconds since the Unix epoch, as 32 bits on the wire.
     */
    timestamp: number;
    eventType: number;
    serverId: number;

    /**
     * Header, body and checksum.
     */
    eventSize: number;

    /**
     * Offset of the byte following this event in the file.  0 in legacy 13 byte headers.
     */
    logPos: number;
    flags: number;
}

export namespace BinlogEventHeader {

    /**
     * Where this event starts in the file.
     */
    export function getStartPosition(header: BinlogEventHeader): number {
        return header.logPos - header.eventSize;
    }

    export function toString(header: BinlogEventHeader): string {
        return `Type:${EventType.getName(header.eventType)}, Time:${new Date(header.timestamp * 1000).toISOString()}, ServerID:${header.serverId}, EventSize:${header.eventSize}, EventEndPos:${header.logPos}, Flag:0x${header.flags.toString(16)}`;
    }
}
