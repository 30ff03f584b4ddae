import {BinlogCursor} from "../codec/BinlogCursor";
import {XidPayload} from "../model/BinlogEvent";

/**
 * Transaction id for 2PC, written whenever a COMMIT is expected.
 */
export function decodeXid(body: Buffer): XidPayload {
    return {
        kind: "xid",
        xid: new BinlogCursor(body).uint64()
    };
}
