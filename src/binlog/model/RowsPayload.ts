import {Bitfield} from "./Bitfield";

export type RowsMutation = "write" | "update" | "delete";

/**
 * WRITE_ROWS, UPDATE_ROWS and DELETE_ROWS event body, versions 0 to 2.
 *
 * Row images are not decoded.  `rowsData` holds them verbatim for anything
 * that wants to decode values against the TableSchema.
 * @see https://dev.mysql.com/doc/internals/en/rows-event.html
 */
export interface RowsPayload {
    kind: "rows";
    version: 0 | 1 | 2;
    mutation: RowsMutation;
    tableId: bigint;
    flags: number;

    /**
     * Version 2 only.
     */
    extraData: Buffer | null;
    columnCount: number;
    columnsPresent: Bitfield;

    /**
     * Update events only: columns present in the after image.
     */
    columnsPresentAfterImage: Bitfield | null;
    rowsData: Buffer;
}
