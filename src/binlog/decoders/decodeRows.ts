import {BinlogDecodeError} from "../BinlogDecodeError";
import {BinlogCursor} from "../codec/BinlogCursor";
import {Bitfield} from "../model/Bitfield";
import {EventType} from "../model/EventType";
import {FormatDescription} from "../model/FormatDescription";
import {RowsMutation, RowsPayload} from "../model/RowsPayload";

const rowsEventLayouts: { [T in EventType.RowsEventType]: { version: 0 | 1 | 2, mutation: RowsMutation } } = {
    [EventType.WRITE_ROWS_EVENT_V0]: {version: 0, mutation: "write"},
    [EventType.UPDATE_ROWS_EVENT_V0]: {version: 0, mutation: "update"},
    [EventType.DELETE_ROWS_EVENT_V0]: {version: 0, mutation: "delete"},
    [EventType.WRITE_ROWS_EVENT_V1]: {version: 1, mutation: "write"},
    [EventType.UPDATE_ROWS_EVENT_V1]: {version: 1, mutation: "update"},
    [EventType.DELETE_ROWS_EVENT_V1]: {version: 1, mutation: "delete"},
    [EventType.WRITE_ROWS_EVENT_V2]: {version: 2, mutation: "write"},
    [EventType.UPDATE_ROWS_EVENT_V2]: {version: 2, mutation: "update"},
    [EventType.DELETE_ROWS_EVENT_V2]: {version: 2, mutation: "delete"}
};

/**
 * Decodes the structure of a rows event up to the row images, which are kept raw.
 */
export function decodeRows(body: Buffer, description: FormatDescription | null, eventType: EventType.RowsEventType): RowsPayload {
    const {version, mutation} = rowsEventLayouts[eventType];
    const cursor = new BinlogCursor(body);
    const tableId = cursor.fixedLengthInt(FormatDescription.getTableIdWidth(description, eventType));
    const flags = cursor.uint16();

    let extraData: Buffer | null = null;
    if (version === 2) {
        // The length includes its own 2 bytes.
        const extraDataLength = cursor.uint16();
        if (extraDataLength < 2) {
            throw new BinlogDecodeError("MalformedBody", `Rows event extra data length ${extraDataLength} is less than 2.`);
        }
        extraData = cursor.bytesOf(extraDataLength - 2);
    }

    const columnCount = cursor.packedInt("column count");
    const bitmapLength = Bitfield.byteLengthFor(columnCount);
    const columnsPresent = new Bitfield(cursor.bytesOf(bitmapLength));
    const columnsPresentAfterImage = mutation === "update" ? new Bitfield(cursor.bytesOf(bitmapLength)) : null;

    return {
        kind: "rows",
        version,
        mutation,
        tableId,
        flags,
        extraData,
        columnCount,
        columnsPresent,
        columnsPresentAfterImage,
        rowsData: cursor.rest()
    };
}
