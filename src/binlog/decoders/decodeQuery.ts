import {BinlogCursor} from "../codec/BinlogCursor";
import {QueryPayload} from "../model/QueryPayload";

export function decodeQuery(body: Buffer, binlogVersion: number): QueryPayload {
    const cursor = new BinlogCursor(body);
    const slaveProxyId = cursor.uint32();
    const executionTime = cursor.uint32();
    const schemaLength = cursor.uint8();
    const errorCode = cursor.uint16();

    let statusVars: Buffer = Buffer.alloc(0);
    if (binlogVersion >= 4) {
        const statusVarsLength = cursor.uint16();
        statusVars = cursor.bytesOf(statusVarsLength);
    }

    const schema = cursor.string(schemaLength);
    cursor.skip(1);     // 0x00

    return {
        kind: "query",
        slaveProxyId,
        executionTime,
        errorCode,
        statusVars,
        schema,
        query: cursor.rest().toString("utf8")
    };
}
