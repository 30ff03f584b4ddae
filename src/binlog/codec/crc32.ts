const crcTable = new Uint32Array(256);
for (let i = 0; i < 256; i++) {
    let c = i;
    for (let k = 0; k < 8; k++) {
        c = (c & 1) ? (0xedb88320 ^ (c >>> 1)) : (c >>> 1);
    }
    crcTable[i] = c;
}

/**
 * CRC-32 (ISO-HDLC, as zlib) of the given buffers taken in order.
 */
export function crc32(...chunks: Uint8Array[]): number {
    let crc = 0xffffffff;
    for (const chunk of chunks) {
        for (let i = 0; i < chunk.length; i++) {
            crc = crcTable[(crc ^ chunk[i]) & 0xff] ^ (crc >>> 8);
        }
    }
    return (crc ^ 0xffffffff) >>> 0;
}
