import {BINLOG_MAGIC} from "../../binlog/BinlogFileDecoder";
import {crc32} from "../../binlog/codec/crc32";
import {DEFAULT_EVENT_HEADER_LENGTH} from "../../binlog/codec/eventHeader";
import {EventType} from "../../binlog/model/EventType";
import {ChecksumAlgorithm} from "../../binlog/model/FormatDescription";

export interface FixtureEventOptions {
    timestamp?: number;
    serverId?: number;
    flags?: number;

    /**
     * Overrides the event size written in the header.
     */
    eventSize?: number;
}

export interface FixtureFormatDescriptionOptions extends FixtureEventOptions {
    binlogVersion?: number;
    serverVersion?: string;
    checksumAlgorithm?: ChecksumAlgorithm;

    /**
     * Post header length of TABLE_MAP_EVENT and the rows events.  6 means 4 byte table ids.
     */
    rowsPostHeaderLength?: number;
}

export interface FixtureTableMapOptions extends FixtureEventOptions {
    tableFlags?: number;
    columnTypes: number[];
    metadata?: Buffer;
    nullBitmap?: Buffer;
}

export interface FixtureRowsOptions extends FixtureEventOptions {
    rowsFlags?: number;
    columnCount: number;
    columnsPresent?: Buffer;
    columnsPresentAfterImage?: Buffer;
    extraData?: Buffer;
    rowsData?: Buffer;
}

/**
 * Where an event ended up in the built binlog.
 */
export interface FixtureEventInfo {
    eventType: number;
    start: number;
    end: number;
}

/**
 * Builds binlog files event by event.  Sizes, positions and checksums are
 * filled in from the most recent format description, as a server would.
 */
export class BinlogFixtureBuilder {

    readonly events: FixtureEventInfo[] = [];
    private readonly chunks: Buffer[] = [BINLOG_MAGIC];
    private position = BINLOG_MAGIC.length;
    private checksumAlgorithm = ChecksumAlgorithm.Undefined;
    private tableIdWidth = 6;

    constructor(private readonly defaultTimestamp: number = 1700000000) {
    }

    formatDescription(options: FixtureFormatDescriptionOptions = {}): this {
        const serverVersion = options.serverVersion ?? "8.0.36";
        const checksumAlgorithm = options.checksumAlgorithm ?? ChecksumAlgorithm.Crc32;
        const rowsPostHeaderLength = options.rowsPostHeaderLength ?? 8;

        const postHeaderLengths = Buffer.alloc(EventType.HEARTBEAT_LOG_EVENT_V2);
        postHeaderLengths[EventType.QUERY_EVENT - 1] = 13;
        postHeaderLengths[EventType.ROTATE_EVENT - 1] = 8;
        postHeaderLengths[EventType.FORMAT_DESCRIPTION_EVENT - 1] = 98;
        postHeaderLengths[EventType.TABLE_MAP_EVENT - 1] = rowsPostHeaderLength;
        for (const eventType of [EventType.WRITE_ROWS_EVENT_V1, EventType.UPDATE_ROWS_EVENT_V1, EventType.DELETE_ROWS_EVENT_V1]) {
            postHeaderLengths[eventType - 1] = rowsPostHeaderLength;
        }
        for (const eventType of [EventType.WRITE_ROWS_EVENT_V2, EventType.UPDATE_ROWS_EVENT_V2, EventType.DELETE_ROWS_EVENT_V2]) {
            postHeaderLengths[eventType - 1] = rowsPostHeaderLength + 2;
        }

        const serverVersionBytes = Buffer.alloc(50);
        serverVersionBytes.write(serverVersion, "utf8");
        const parts = [
            uint16(options.binlogVersion ?? 4),
            serverVersionBytes,
            uint32(options.timestamp ?? this.defaultTimestamp),
            Buffer.from([DEFAULT_EVENT_HEADER_LENGTH]),
            postHeaderLengths
        ];

        if (isChecksumCapable(serverVersion)) {
            parts.push(Buffer.from([checksumAlgorithm]));
            this.checksumAlgorithm = checksumAlgorithm;
            // The format description carries a checksum value even when checksums are off.
            this.appendEvent(EventType.FORMAT_DESCRIPTION_EVENT, Buffer.concat(parts), options, true);
        } else {
            this.checksumAlgorithm = ChecksumAlgorithm.Undefined;
            this.appendEvent(EventType.FORMAT_DESCRIPTION_EVENT, Buffer.concat(parts), options, false);
        }
        this.tableIdWidth = rowsPostHeaderLength === 6 ? 4 : 6;
        return this;
    }

    query(schema: string, query: string, statusVars: Buffer = Buffer.alloc(0), options: FixtureEventOptions = {}): this {
        const schemaBytes = Buffer.from(schema, "utf8");
        return this.event(EventType.QUERY_EVENT, Buffer.concat([
            uint32(77),     // slave proxy id
            uint32(0),      // execution time
            Buffer.from([schemaBytes.length]),
            uint16(0),      // error code
            uint16(statusVars.length),
            statusVars,
            schemaBytes,
            Buffer.from([0]),
            Buffer.from(query, "utf8")
        ]), options);
    }

    xid(xid: bigint, options: FixtureEventOptions = {}): this {
        return this.event(EventType.XID_EVENT, uint64(xid), options);
    }

    intvar(type: number, value: bigint, options: FixtureEventOptions = {}): this {
        return this.event(EventType.INTVAR_EVENT, Buffer.concat([Buffer.from([type]), uint64(value)]), options);
    }

    rotate(fileName: string, position: bigint = 4n, options: FixtureEventOptions = {}): this {
        return this.event(EventType.ROTATE_EVENT, Buffer.concat([uint64(position), Buffer.from(fileName, "utf8")]), options);
    }

    stop(options: FixtureEventOptions = {}): this {
        return this.event(EventType.STOP_EVENT, Buffer.alloc(0), options);
    }

    tableMap(tableId: bigint, schema: string, table: string, options: FixtureTableMapOptions): this {
        const metadata = options.metadata ?? Buffer.alloc(0);
        const nullBitmap = options.nullBitmap ?? Buffer.alloc(Math.floor((options.columnTypes.length + 7) / 8));
        return this.event(EventType.TABLE_MAP_EVENT, Buffer.concat([
            uintLE(tableId, this.tableIdWidth),
            uint16(options.tableFlags ?? 1),
            lengthPrefixedName(schema),
            lengthPrefixedName(table),
            packedInt(options.columnTypes.length),
            Buffer.from(options.columnTypes),
            packedInt(metadata.length),
            metadata,
            nullBitmap
        ]), options);
    }

    rows(eventType: EventType.RowsEventType, tableId: bigint, options: FixtureRowsOptions): this {
        const bitmapLength = Math.floor((options.columnCount + 7) / 8);
        const parts = [
            uintLE(tableId, this.tableIdWidth),
            uint16(options.rowsFlags ?? 1)
        ];
        if (eventType >= EventType.WRITE_ROWS_EVENT_V2) {
            const extraData = options.extraData ?? Buffer.alloc(0);
            parts.push(uint16(extraData.length + 2), extraData);
        }
        parts.push(
            packedInt(options.columnCount),
            options.columnsPresent ?? Buffer.alloc(bitmapLength, 0xff)
        );
        if (eventType === EventType.UPDATE_ROWS_EVENT_V0 || eventType === EventType.UPDATE_ROWS_EVENT_V1 || eventType === EventType.UPDATE_ROWS_EVENT_V2) {
            parts.push(options.columnsPresentAfterImage ?? Buffer.alloc(bitmapLength, 0xff));
        }
        parts.push(options.rowsData ?? Buffer.alloc(0));
        return this.event(eventType, Buffer.concat(parts), options);
    }

    /**
     * Appends an event with the given body, checksummed if the stream is.
     */
    event(eventType: number, body: Buffer, options: FixtureEventOptions = {}): this {
        this.appendEvent(eventType, body, options, this.checksumAlgorithm === ChecksumAlgorithm.Crc32);
        return this;
    }

    /**
     * Appends bytes that aren't a whole event.
     */
    raw(bytes: Buffer): this {
        this.chunks.push(bytes);
        this.position += bytes.length;
        return this;
    }

    build(): Buffer {
        return Buffer.concat(this.chunks);
    }

    private appendEvent(eventType: number, body: Buffer, options: FixtureEventOptions, withChecksum: boolean): void {
        const eventSize = DEFAULT_EVENT_HEADER_LENGTH + body.length + (withChecksum ? 4 : 0);
        const header = Buffer.alloc(DEFAULT_EVENT_HEADER_LENGTH);
        header.writeUInt32LE(options.timestamp ?? this.defaultTimestamp, 0);
        header.writeUInt8(eventType, 4);
        header.writeUInt32LE(options.serverId ?? 1, 5);
        header.writeUInt32LE(options.eventSize ?? eventSize, 9);
        header.writeUInt32LE(this.position + eventSize, 13);
        header.writeUInt16LE(options.flags ?? 0, 17);

        const chunks = [header, body];
        if (withChecksum) {
            chunks.push(uint32(crc32(header, body)));
        }
        this.chunks.push(...chunks);
        this.events.push({eventType, start: this.position, end: this.position + eventSize});
        this.position += eventSize;
    }
}

function isChecksumCapable(serverVersion: string): boolean {
    const match = /^(\d+)\.(\d+)\.(\d+)/.exec(serverVersion);
    if (!match) {
        return true;
    }
    const version = +match[1] * 10000 + +match[2] * 100 + +match[3];
    return version >= (serverVersion.includes("MariaDB") ? 50300 : 50601);
}

export function uint16(value: number): Buffer {
    const b = Buffer.alloc(2);
    b.writeUInt16LE(value, 0);
    return b;
}

export function uint32(value: number): Buffer {
    const b = Buffer.alloc(4);
    b.writeUInt32LE(value, 0);
    return b;
}

export function uint64(value: bigint): Buffer {
    const b = Buffer.alloc(8);
    b.writeBigUInt64LE(value, 0);
    return b;
}

export function uintLE(value: bigint, width: number): Buffer {
    return uint64(value).subarray(0, width);
}

export function packedInt(value: number): Buffer {
    if (value <= 0xfa) {
        return Buffer.from([value]);
    }
    if (value <= 0xffff) {
        return Buffer.concat([Buffer.from([0xfc]), uint16(value)]);
    }
    if (value <= 0xffffff) {
        const b = Buffer.alloc(4);
        b[0] = 0xfd;
        b.writeUIntLE(value, 1, 3);
        return b;
    }
    return Buffer.concat([Buffer.from([0xfe]), uint64(BigInt(value))]);
}

function lengthPrefixedName(name: string): Buffer {
    const bytes = Buffer.from(name, "utf8");
    return Buffer.concat([Buffer.from([bytes.length]), bytes, Buffer.from([0])]);
}
