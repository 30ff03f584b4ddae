import {BinlogDecodeError} from "../BinlogDecodeError";
import {BinlogCursor} from "../codec/BinlogCursor";
import {Bitfield} from "../model/Bitfield";
import {ColumnMetadata, ColumnType} from "../model/ColumnType";
import {EventType} from "../model/EventType";
import {FormatDescription} from "../model/FormatDescription";
import {TableSchema} from "../model/TableSchema";

export function decodeTableMap(body: Buffer, description: FormatDescription | null): TableSchema {
    const cursor = new BinlogCursor(body);
    const tableId = cursor.fixedLengthInt(FormatDescription.getTableIdWidth(description, EventType.TABLE_MAP_EVENT));
    const flags = cursor.uint16();

    const schemaName = cursor.string(cursor.uint8());
    cursor.skip(1);     // 0x00
    const tableName = cursor.string(cursor.uint8());
    cursor.skip(1);     // 0x00

    const columnCount = cursor.packedInt("column count");
    const columnTypes: ColumnType[] = Array.from(cursor.bytesOf(columnCount));
    const columnMetadata = decodeColumnMetadata(columnTypes, new BinlogCursor(cursor.packedString()));

    const nullBitmapLength = Bitfield.byteLengthFor(columnCount);
    if (cursor.remaining !== nullBitmapLength) {
        throw new BinlogDecodeError("MalformedBody", `Table map for ${schemaName}.${tableName} has ${cursor.remaining} bytes of null bitmap, expected ${nullBitmapLength}.`);
    }

    return {
        kind: "tableMap",
        tableId,
        flags,
        schemaName,
        tableName,
        columnCount,
        columnTypes,
        columnMetadata,
        nullBitmap: new Bitfield(cursor.rest())
    };
}

/**
 * Reads the metadata block, which has an entry only for column types that need one.
 */
function decodeColumnMetadata(columnTypes: ColumnType[], cursor: BinlogCursor): ColumnMetadata[] {
    return columnTypes.map((columnType, columnIx): ColumnMetadata => {
        switch (columnType) {
            case ColumnType.STRING:
            case ColumnType.ENUM:
            case ColumnType.SET:
                return decodeStringMetadata(cursor.uint8(), cursor.uint8());
            case ColumnType.VAR_STRING:
            case ColumnType.VARCHAR:
                return {kind: "varLength", maxLength: cursor.uint16()};
            case ColumnType.BIT: {
                const bits = cursor.uint8();
                const bytes = cursor.uint8();
                const totalBits = bytes * 8 + bits;
                return {kind: "bit", bits: totalBits, bytes: Bitfield.byteLengthFor(totalBits)};
            }
            case ColumnType.BLOB:
            case ColumnType.TINY_BLOB:
            case ColumnType.MEDIUM_BLOB:
            case ColumnType.LONG_BLOB:
            case ColumnType.GEOMETRY:
            case ColumnType.JSON:
            case ColumnType.DOUBLE:
            case ColumnType.FLOAT:
                return {kind: "packLength", lengthSize: cursor.uint8()};
            case ColumnType.NEWDECIMAL:
                return {kind: "decimal", precision: cursor.uint8(), decimals: cursor.uint8()};
            case ColumnType.TIME2:
            case ColumnType.DATETIME2:
            case ColumnType.TIMESTAMP2:
                return {kind: "fractionalSeconds", fsp: cursor.uint8()};
            case ColumnType.DECIMAL:
            case ColumnType.TINY:
            case ColumnType.SHORT:
            case ColumnType.INT24:
            case ColumnType.LONG:
            case ColumnType.LONGLONG:
            case ColumnType.NULL:
            case ColumnType.YEAR:
            case ColumnType.NEWDATE:
            case ColumnType.DATE:
            case ColumnType.DATETIME:
            case ColumnType.TIMESTAMP:
            case ColumnType.TIME:
                return {kind: "none"};
            default:
                throw new BinlogDecodeError("MalformedBody", `Unknown column type ${columnType} for column ${columnIx}.`);
        }
    });
}

/**
 * CHAR, ENUM and SET columns all carry the real type in the first byte.  For
 * CHAR the top bits of the max length are folded into the real type byte.
 */
function decodeStringMetadata(realType: number, length: number): ColumnMetadata {
    if (realType === ColumnType.ENUM) {
        return {kind: "enumOrSet", realType: ColumnType.ENUM, size: length};
    }
    if (realType === ColumnType.SET) {
        return {kind: "enumOrSet", realType: ColumnType.SET, size: length};
    }
    const metadata = (realType << 8) + length;
    return {kind: "string", maxLength: (((metadata >> 4) & 0x300) ^ 0x300) + (metadata & 0x00ff)};
}
