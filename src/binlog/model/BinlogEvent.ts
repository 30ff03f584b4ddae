import {BinlogEventHeader} from "./BinlogEventHeader";
import {ChecksumAlgorithm, FormatDescription} from "./FormatDescription";
import {QueryPayload} from "./QueryPayload";
import {RowsPayload} from "./RowsPayload";
import {TableSchema} from "./TableSchema";

/**
 * @see https://dev.mysql.com/doc/internals/en/xid-event.html
 */
export interface XidPayload {
    kind: "xid";
    xid: bigint;
}

export enum IntvarType {
    InvalidInt = 0,
    LastInsertId = 1,
    InsertId = 2
}

/**
 * @see https://dev.mysql.com/doc/internals/en/intvar-event.html
 */
export interface IntvarPayload {
    kind: "intvar";
    type: IntvarType | number;
    value: bigint;
}

/**
 * The binlog continues in another file.
 * @see https://dev.mysql.com/doc/internals/en/rotate-event.html
 */
export interface RotatePayload {
    kind: "rotate";
    position: bigint;
    fileName: string;
}

/**
 * A row event together with the table map it refers to.
 */
export interface RowsEventPayload extends RowsPayload {
    table: TableSchema;
}

/**
 * The body of an event type that is recognized but not interpreted.
 */
export interface UnsupportedPayload {
    kind: "unsupported";
    data: Buffer;
}

export type BinlogEventBody =
    FormatDescription
    | QueryPayload
    | XidPayload
    | IntvarPayload
    | RotatePayload
    | TableSchema
    | RowsEventPayload
    | UnsupportedPayload;

/**
 * One decoded event.
 */
export interface BinlogEvent<T extends BinlogEventBody = BinlogEventBody> {
    header: BinlogEventHeader;
    body: T;
    checksum: BinlogEvent.Checksum | null;
}

export namespace BinlogEvent {
    export interface Checksum {
        algorithm: ChecksumAlgorithm;
        value: Buffer;
    }

    export function isKind<K extends BinlogEventBody["kind"]>(event: BinlogEvent, kind: K): event is BinlogEvent<Extract<BinlogEventBody, { kind: K }>> {
        return event.body.kind === kind;
    }
}
