import {BinlogDecodeError} from "../BinlogDecodeError";

/**
 * A decoded length-encoded integer.
 */
export interface PackedInt {
    /**
     * `null` for the NULL marker 0xFB.
     */
    value: bigint | null;
    isNull: boolean;

    /**
     * Bytes consumed, including the prefix.
     */
    length: number;
}

export interface PackedString {
    value: Buffer;
    isNull: boolean;

    /**
     * Bytes consumed, including the length prefix.
     */
    length: number;
}

export function assertAvailable(bytes: Buffer, offset: number, length: number, what: string): void {
    if (offset < 0 || length < 0 || offset + length > bytes.length) {
        throw new BinlogDecodeError("Truncated", `Need ${length} bytes at offset ${offset} to read ${what} but only ${Math.max(bytes.length - offset, 0)} remain.`);
    }
}

/**
 * Little endian unsigned integer of 1 to 8 bytes.
 */
export function readFixedLengthInt(bytes: Buffer, offset: number, width: number): bigint {
    if (!Number.isInteger(width) || width < 1 || width > 8) {
        throw new RangeError(`Fixed length int width must be 1 to 8, got ${width}.`);
    }
    assertAvailable(bytes, offset, width, `a ${width} byte int`);

    let value = 0n;
    for (let i = width - 1; i >= 0; i--) {
        value = (value << 8n) | BigInt(bytes[offset + i]);
    }
    return value;
}

/**
 * MySQL length-encoded integer.
 * @see https://dev.mysql.com/doc/internals/en/integer.html#packet-Protocol::LengthEncodedInteger
 */
export function readPackedInt(bytes: Buffer, offset: number): PackedInt {
    assertAvailable(bytes, offset, 1, "a packed int prefix");
    const prefix = bytes[offset];

    if (prefix <= 0xfa) {
        return {value: BigInt(prefix), isNull: false, length: 1};
    }
    switch (prefix) {
        case 0xfb:
            return {value: null, isNull: true, length: 1};
        case 0xfc:
            return {value: readFixedLengthInt(bytes, offset + 1, 2), isNull: false, length: 3};
        case 0xfd:
            return {value: readFixedLengthInt(bytes, offset + 1, 3), isNull: false, length: 4};
        case 0xfe:
            return {value: readFixedLengthInt(bytes, offset + 1, 8), isNull: false, length: 9};
        default:
            throw new BinlogDecodeError("MalformedBody", `Invalid packed int prefix 0x${prefix.toString(16)} at offset ${offset}.`);
    }
}

/**
 * MySQL length-encoded string: a packed int length followed by that many bytes.
 */
export function readPackedString(bytes: Buffer, offset: number): PackedString {
    const length = readPackedInt(bytes, offset);
    if (length.value === null) {
        return {value: Buffer.alloc(0), isNull: true, length: length.length};
    }
    const valueLength = toSafeNumber(length.value, "packed string length");
    assertAvailable(bytes, offset + length.length, valueLength, "a packed string");
    return {
        value: bytes.subarray(offset + length.length, offset + length.length + valueLength),
        isNull: false,
        length: length.length + valueLength
    };
}

export function toSafeNumber(value: bigint, what: string): number {
    if (value > BigInt(Number.MAX_SAFE_INTEGER)) {
        throw new BinlogDecodeError("MalformedBody", `${what} ${value} is too large.`);
    }
    return Number(value);
}
