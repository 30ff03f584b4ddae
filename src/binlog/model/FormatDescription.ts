import {EventType} from "./EventType";

/**
 * The checksum algorithm named by a format description.
 */
export enum ChecksumAlgorithm {
    Off = 0,
    Crc32 = 1,

    /**
     * The server predates binlog checksums and writes no algorithm byte.
     */
    Undefined = 255
}

/**
 * FORMAT_DESCRIPTION_EVENT body.  Describes the layout of every event that follows it.
 * @see https://dev.mysql.com/doc/internals/en/format-description-event.html
 */
export interface FormatDescription {
    kind: "formatDescription";
    binlogVersion: number;
    serverVersion: string;
    createTimestamp: number;

    /**
     * Length of the common header of every later event, 19 since binlog version 4.
     */
    headerLength: number;

    /**
     * Post header length of each event type, indexed by type code - 1.
     */
    eventTypeHeaderLengths: Buffer;
    checksumAlgorithm: ChecksumAlgorithm;
    checksumEnabled: boolean;
}

export namespace FormatDescription {

    /**
     * The post header length declared for `eventType`, if the table has an entry for it.
     */
    export function getEventTypeHeaderLength(description: FormatDescription, eventType: EventType): number | undefined {
        return description.eventTypeHeaderLengths[eventType - 1];
    }

    /**
     * Table ids are 4 bytes wide in streams whose post header for the event is 6 bytes long.
     */
    export function getTableIdWidth(description: FormatDescription | null, eventType: EventType): 4 | 6 {
        if (description && getEventTypeHeaderLength(description, eventType) === 6) {
            return 4;
        }
        return 6;
    }
}
