import {BinlogCursor} from "../codec/BinlogCursor";
import {IntvarPayload} from "../model/BinlogEvent";

export function decodeIntvar(body: Buffer): IntvarPayload {
    const cursor = new BinlogCursor(body);
    return {
        kind: "intvar",
        type: cursor.uint8(),
        value: cursor.uint64()
    };
}
