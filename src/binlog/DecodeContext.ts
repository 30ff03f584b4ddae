import {BinlogDecodeError} from "./BinlogDecodeError";
import {DEFAULT_EVENT_HEADER_LENGTH} from "./codec/eventHeader";
import {EventType} from "./model/EventType";
import {ChecksumAlgorithm, FormatDescription} from "./model/FormatDescription";
import {TableSchema} from "./model/TableSchema";

/**
 * Binlog version assumed until a format description says otherwise.
 */
export const DEFAULT_BINLOG_VERSION = 4;

/**
 * State carried from one event to the next within a single binlog stream.
 * Owned by one decoder; never share it between streams.
 */
export class DecodeContext {

    private description: FormatDescription | null = null;
    private readonly tables = new Map<bigint, TableSchema>();

    get formatDescription(): FormatDescription | null {
        return this.description;
    }

    adoptFormatDescription(description: FormatDescription): void {
        this.description = description;
    }

    registerTable(schema: TableSchema): void {
        this.tables.set(schema.tableId, schema);
    }

    headerWidth(): number {
        return this.description ? this.description.headerLength : DEFAULT_EVENT_HEADER_LENGTH;
    }

    headerWidthFor(eventType: EventType): number | undefined {
        return this.description ? FormatDescription.getEventTypeHeaderLength(this.description, eventType) : undefined;
    }

    binlogVersion(): number {
        return this.description ? this.description.binlogVersion : DEFAULT_BINLOG_VERSION;
    }

    checksumAlgorithm(): ChecksumAlgorithm {
        return this.description ? this.description.checksumAlgorithm : ChecksumAlgorithm.Undefined;
    }

    checksumEnabled(): boolean {
        return !!this.description?.checksumEnabled;
    }

    hasTable(tableId: bigint): boolean {
        return this.tables.has(tableId);
    }

    tableSchema(tableId: bigint): TableSchema {
        const schema = this.tables.get(tableId);
        if (!schema) {
            throw new BinlogDecodeError("UnknownTable", `No table map seen for table id ${tableId}.`);
        }
        return schema;
    }

    get tableCount(): number {
        return this.tables.size;
    }
}
