/**
 * Booleans packed one per bit, starting at the least significant bit of the
 * first byte.
 */
export class Bitfield {

    constructor(readonly bytes: Buffer) {
    }

    static byteLengthFor(bitCount: number): number {
        return Math.floor((bitCount + 7) / 8);
    }

    isSet(index: number): boolean {
        const byte = this.bytes[index >> 3];
        if (byte === undefined || index < 0) {
            return false;
        }
        return ((byte >> (index % 8)) & 1) === 1;
    }

    /**
     * The first `bitCount` bits as booleans.
     */
    toArray(bitCount: number): boolean[] {
        const res: boolean[] = [];
        for (let i = 0; i < bitCount; i++) {
            res.push(this.isSet(i));
        }
        return res;
    }
}
