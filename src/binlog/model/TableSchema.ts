import {Bitfield} from "./Bitfield";
import {ColumnMetadata, ColumnType} from "./ColumnType";

/**
 * TABLE_MAP_EVENT body.  Binds a table id to the table's column layout for
 * the row events that follow.
 * @see https://dev.mysql.com/doc/internals/en/table-map-event.html
 */
export interface TableSchema {
    kind: "tableMap";
    tableId: bigint;
    flags: number;
    schemaName: string;
    tableName: string;
    columnCount: number;
    columnTypes: ColumnType[];
    columnMetadata: ColumnMetadata[];

    /**
     * Bit i is set when column i is nullable.
     */
    nullBitmap: Bitfield;
}
