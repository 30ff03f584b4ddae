import * as chai from "chai";
import {BinlogEventHeader} from "./BinlogEventHeader";

describe("BinlogEventHeader", () => {
    const header: BinlogEventHeader = {
        timestamp: 1700000000,
        eventType: 16,
        serverId: 3,
        eventSize: 31,
        logPos: 500,
        flags: 0
    };

    it("getStartPosition() is the end position less the size", () => {
        chai.assert.equal(BinlogEventHeader.getStartPosition(header), 469);
    });

    it("toString() describes the header", () => {
        chai.assert.equal(
            BinlogEventHeader.toString(header),
            "Type:XID_EVENT, Time:2023-11-14T22:13:20.000Z, ServerID:3, EventSize:31, EventEndPos:500, Flag:0x0"
        );
    });
});
