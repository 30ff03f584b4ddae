import * as chai from "chai";
import {DecodeContext} from "./DecodeContext";
import {Bitfield} from "./model/Bitfield";
import {EventType} from "./model/EventType";
import {ChecksumAlgorithm, FormatDescription} from "./model/FormatDescription";
import {TableSchema} from "./model/TableSchema";
import {assertThrowsBinlogDecodeError} from "../utils/testUtils/assertBinlogDecodeError";

describe("DecodeContext", () => {
    const description: FormatDescription = {
        kind: "formatDescription",
        binlogVersion: 4,
        serverVersion: "8.0.36",
        createTimestamp: 0,
        headerLength: 19,
        eventTypeHeaderLengths: Buffer.from([56, 13, 0, 8]),
        checksumAlgorithm: ChecksumAlgorithm.Crc32,
        checksumEnabled: true
    };

    function getTable(tableId: bigint, tableName: string): TableSchema {
        return {
            kind: "tableMap",
            tableId,
            flags: 1,
            schemaName: "shop",
            tableName,
            columnCount: 1,
            columnTypes: [3],
            columnMetadata: [{kind: "none"}],
            nullBitmap: new Bitfield(Buffer.from([0]))
        };
    }

    it("has defaults before a format description", () => {
        const context = new DecodeContext();
        chai.assert.isNull(context.formatDescription);
        chai.assert.equal(context.headerWidth(), 19);
        chai.assert.equal(context.binlogVersion(), 4);
        chai.assert.equal(context.checksumAlgorithm(), ChecksumAlgorithm.Undefined);
        chai.assert.isFalse(context.checksumEnabled());
        chai.assert.isUndefined(context.headerWidthFor(EventType.QUERY_EVENT));
        chai.assert.equal(context.tableCount, 0);
    });

    it("takes its layout from an adopted format description", () => {
        const context = new DecodeContext();
        context.adoptFormatDescription({...description, headerLength: 13, binlogVersion: 3});
        chai.assert.equal(context.headerWidth(), 13);
        chai.assert.equal(context.binlogVersion(), 3);
        chai.assert.equal(context.checksumAlgorithm(), ChecksumAlgorithm.Crc32);
        chai.assert.isTrue(context.checksumEnabled());
        chai.assert.equal(context.headerWidthFor(EventType.QUERY_EVENT), 13);
        chai.assert.equal(context.headerWidthFor(EventType.ROTATE_EVENT), 8);
        chai.assert.isUndefined(context.headerWidthFor(EventType.XID_EVENT));
    });

    it("replaces the format description when a new one is adopted", () => {
        const context = new DecodeContext();
        context.adoptFormatDescription(description);
        context.adoptFormatDescription({...description, checksumAlgorithm: ChecksumAlgorithm.Off, checksumEnabled: false});
        chai.assert.equal(context.checksumAlgorithm(), ChecksumAlgorithm.Off);
        chai.assert.isFalse(context.checksumEnabled());
    });

    it("looks up registered tables by id", () => {
        const context = new DecodeContext();
        context.registerTable(getTable(42n, "orders"));
        chai.assert.isTrue(context.hasTable(42n));
        chai.assert.equal(context.tableSchema(42n).tableName, "orders");
        chai.assert.equal(context.tableCount, 1);
    });

    it("replaces a table registered again under the same id", () => {
        const context = new DecodeContext();
        context.registerTable(getTable(42n, "orders"));
        context.registerTable(getTable(42n, "invoices"));
        chai.assert.equal(context.tableSchema(42n).tableName, "invoices");
        chai.assert.equal(context.tableCount, 1);
    });

    it("throws UnknownTable for an unregistered id", () => {
        const context = new DecodeContext();
        context.registerTable(getTable(42n, "orders"));
        chai.assert.isFalse(context.hasTable(43n));
        const err = assertThrowsBinlogDecodeError(() => context.tableSchema(43n), "UnknownTable");
        chai.assert.isFalse(err.fatal);
    });
});
