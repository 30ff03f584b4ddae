import * as chai from "chai";
import {decodeRows} from "./decodeRows";
import {EventType} from "../model/EventType";
import {ChecksumAlgorithm, FormatDescription} from "../model/FormatDescription";
import {assertThrowsBinlogDecodeError} from "../../utils/testUtils/assertBinlogDecodeError";
import {packedInt, uint16, uintLE} from "../../utils/testUtils/BinlogFixtureBuilder";

describe("decodeRows()", () => {
    const rowsData = Buffer.from([0x00, 0x01, 0x00, 0x00, 0x00]);

    it("decodes a version 1 write", () => {
        const body = Buffer.concat([uintLE(42n, 6), uint16(1), packedInt(3), Buffer.from([0b101]), rowsData]);
        const rows = decodeRows(body, null, EventType.WRITE_ROWS_EVENT_V1);
        chai.assert.equal(rows.kind, "rows");
        chai.assert.equal(rows.version, 1);
        chai.assert.equal(rows.mutation, "write");
        chai.assert.equal(rows.tableId, 42n);
        chai.assert.equal(rows.flags, 1);
        chai.assert.isNull(rows.extraData);
        chai.assert.equal(rows.columnCount, 3);
        chai.assert.deepEqual(rows.columnsPresent.toArray(3), [true, false, true]);
        chai.assert.isNull(rows.columnsPresentAfterImage);
        chai.assert.equal(rows.rowsData.toString("hex"), rowsData.toString("hex"));
    });

    it("decodes a version 2 update with extra data", () => {
        const body = Buffer.concat([
            uintLE(7n, 6),
            uint16(0),
            uint16(5),
            Buffer.from([0x00, 0x01, 0x00]),
            packedInt(9),
            Buffer.from([0xff, 0x01]),
            Buffer.from([0x03, 0x00]),
            rowsData
        ]);
        const rows = decodeRows(body, null, EventType.UPDATE_ROWS_EVENT_V2);
        chai.assert.equal(rows.version, 2);
        chai.assert.equal(rows.mutation, "update");
        chai.assert.equal(rows.extraData?.toString("hex"), "000100");
        chai.assert.equal(rows.columnCount, 9);
        chai.assert.equal(rows.columnsPresent.bytes.toString("hex"), "ff01");
        chai.assert.equal(rows.columnsPresentAfterImage?.bytes.toString("hex"), "0300");
        chai.assert.equal(rows.rowsData.toString("hex"), rowsData.toString("hex"));
    });

    it("decodes a version 2 delete with no extra data", () => {
        const body = Buffer.concat([uintLE(7n, 6), uint16(0), uint16(2), packedInt(1), Buffer.from([0x01]), rowsData]);
        const rows = decodeRows(body, null, EventType.DELETE_ROWS_EVENT_V2);
        chai.assert.equal(rows.mutation, "delete");
        chai.assert.equal(rows.extraData?.length, 0);
        chai.assert.isNull(rows.columnsPresentAfterImage);
        chai.assert.equal(rows.rowsData.length, rowsData.length);
    });

    it("reads the after image bitmap of version 0 updates", () => {
        const body = Buffer.concat([uintLE(7n, 6), uint16(0), packedInt(2), Buffer.from([0x03]), Buffer.from([0x02]), rowsData]);
        const rows = decodeRows(body, null, EventType.UPDATE_ROWS_EVENT_V0);
        chai.assert.equal(rows.version, 0);
        chai.assert.deepEqual(rows.columnsPresentAfterImage?.toArray(2), [false, true]);
        chai.assert.equal(rows.rowsData.toString("hex"), rowsData.toString("hex"));
    });

    it("reads 4 byte table ids when the post header is 6 bytes", () => {
        const eventTypeHeaderLengths = Buffer.alloc(EventType.HEARTBEAT_LOG_EVENT_V2);
        eventTypeHeaderLengths[EventType.WRITE_ROWS_EVENT_V1 - 1] = 6;
        const description: FormatDescription = {
            kind: "formatDescription",
            binlogVersion: 4,
            serverVersion: "5.1.12",
            createTimestamp: 0,
            headerLength: 19,
            eventTypeHeaderLengths,
            checksumAlgorithm: ChecksumAlgorithm.Undefined,
            checksumEnabled: false
        };
        const body = Buffer.concat([uintLE(42n, 4), uint16(1), packedInt(1), Buffer.from([0x01]), rowsData]);
        const rows = decodeRows(body, description, EventType.WRITE_ROWS_EVENT_V1);
        chai.assert.equal(rows.tableId, 42n);
        chai.assert.equal(rows.rowsData.toString("hex"), rowsData.toString("hex"));
    });

    it("throws MalformedBody when the extra data length is under 2", () => {
        const body = Buffer.concat([uintLE(7n, 6), uint16(0), uint16(1), packedInt(1), Buffer.from([0x01])]);
        assertThrowsBinlogDecodeError(() => decodeRows(body, null, EventType.WRITE_ROWS_EVENT_V2), "MalformedBody");
    });

    it("throws Truncated when the bitmap is cut off", () => {
        const body = Buffer.concat([uintLE(7n, 6), uint16(0), packedInt(9), Buffer.from([0xff])]);
        assertThrowsBinlogDecodeError(() => decodeRows(body, null, EventType.WRITE_ROWS_EVENT_V1), "Truncated");
    });
});
