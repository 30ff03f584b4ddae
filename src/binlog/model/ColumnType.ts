/**
 * MySQL column type codes as they appear in a table map.
 */
export enum ColumnType {
    DECIMAL = 0,
    TINY = 1,
    SHORT = 2,
    LONG = 3,
    FLOAT = 4,
    DOUBLE = 5,
    NULL = 6,
    TIMESTAMP = 7,
    LONGLONG = 8,
    INT24 = 9,
    DATE = 10,
    TIME = 11,
    DATETIME = 12,
    YEAR = 13,
    NEWDATE = 14,
    VARCHAR = 15,
    BIT = 16,
    TIMESTAMP2 = 17,
    DATETIME2 = 18,
    TIME2 = 19,
    JSON = 245,
    NEWDECIMAL = 246,
    ENUM = 247,
    SET = 248,
    TINY_BLOB = 249,
    MEDIUM_BLOB = 250,
    LONG_BLOB = 251,
    BLOB = 252,
    VAR_STRING = 253,
    STRING = 254,
    GEOMETRY = 255
}

/**
 * Per column metadata from the table map.  The shape depends on the column type.
 */
export type ColumnMetadata =
    ColumnMetadata.None
    | ColumnMetadata.String
    | ColumnMetadata.EnumOrSet
    | ColumnMetadata.VarLength
    | ColumnMetadata.Bit
    | ColumnMetadata.PackLength
    | ColumnMetadata.Decimal
    | ColumnMetadata.FractionalSeconds;

export namespace ColumnMetadata {
    export interface None {
        kind: "none";
    }

    /**
     * CHAR and BINARY columns.
     */
    export interface String {
        kind: "string";
        maxLength: number;
    }

    /**
     * ENUM and SET columns, which are written with the STRING type code.
     */
    export interface EnumOrSet {
        kind: "enumOrSet";
        realType: ColumnType.ENUM | ColumnType.SET;

        /**
         * Bytes used to store the value.
         */
        size: number;
    }

    /**
     * VARCHAR and VAR_STRING columns.
     */
    export interface VarLength {
        kind: "varLength";
        maxLength: number;
    }

    export interface Bit {
        kind: "bit";
        bits: number;
        bytes: number;
    }

    /**
     * BLOB, TEXT, JSON and GEOMETRY length prefix size, or FLOAT and DOUBLE storage size.
     */
    export interface PackLength {
        kind: "packLength";
        lengthSize: number;
    }

    export interface Decimal {
        kind: "decimal";
        precision: number;
        decimals: number;
    }

    /**
     * TIME2, DATETIME2 and TIMESTAMP2 fractional seconds precision.
     */
    export interface FractionalSeconds {
        kind: "fractionalSeconds";
        fsp: number;
    }
}
