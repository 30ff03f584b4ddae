import {BinlogCursor} from "../codec/BinlogCursor";
import {RotatePayload} from "../model/BinlogEvent";

/**
 * Where the next file starts when binlog version 1 doesn't say: just past the magic header.
 */
const DEFAULT_ROTATE_POSITION = 4n;

export function decodeRotate(body: Buffer, binlogVersion: number): RotatePayload {
    const cursor = new BinlogCursor(body);
    const position = binlogVersion > 1 ? cursor.uint64() : DEFAULT_ROTATE_POSITION;
    return {
        kind: "rotate",
        position,
        fileName: cursor.rest().toString("utf8").trim()
    };
}
