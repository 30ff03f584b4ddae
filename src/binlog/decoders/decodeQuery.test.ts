import * as chai from "chai";
import {decodeQuery} from "./decodeQuery";
import {assertThrowsBinlogDecodeError} from "../../utils/testUtils/assertBinlogDecodeError";
import {uint16, uint32} from "../../utils/testUtils/BinlogFixtureBuilder";

describe("decodeQuery()", () => {
    const statusVars = Buffer.from([0x00, 0x00, 0x00, 0x00, 0x00]);

    it("decodes a binlog version 4 query", () => {
        const body = Buffer.concat([
            uint32(12),
            uint32(2),
            Buffer.from([4]),
            uint16(0),
            uint16(statusVars.length),
            statusVars,
            Buffer.from("shop\0BEGIN", "utf8")
        ]);
        const query = decodeQuery(body, 4);
        chai.assert.equal(query.kind, "query");
        chai.assert.equal(query.slaveProxyId, 12);
        chai.assert.equal(query.executionTime, 2);
        chai.assert.equal(query.errorCode, 0);
        chai.assert.equal(query.statusVars.toString("hex"), "0000000000");
        chai.assert.equal(query.schema, "shop");
        chai.assert.equal(query.query, "BEGIN");
    });

    it("reads no status vars before binlog version 4", () => {
        const body = Buffer.concat([
            uint32(12),
            uint32(0),
            Buffer.from([0]),
            uint16(1146),
            Buffer.from("\0DROP TABLE t", "utf8")
        ]);
        const query = decodeQuery(body, 3);
        chai.assert.equal(query.errorCode, 1146);
        chai.assert.equal(query.statusVars.length, 0);
        chai.assert.equal(query.schema, "");
        chai.assert.equal(query.query, "DROP TABLE t");
    });

    it("keeps multibyte text intact", () => {
        const body = Buffer.concat([
            uint32(1),
            uint32(0),
            Buffer.from([4]),
            uint16(0),
            uint16(0),
            Buffer.from("shop\0INSERT INTO t VALUES ('café')", "utf8")
        ]);
        chai.assert.equal(decodeQuery(body, 4).query, "INSERT INTO t VALUES ('café')");
    });

    it("throws Truncated when the status vars run past the body", () => {
        const body = Buffer.concat([uint32(1), uint32(0), Buffer.from([0]), uint16(0), uint16(40), Buffer.from([0, 0])]);
        assertThrowsBinlogDecodeError(() => decodeQuery(body, 4), "Truncated");
    });
});
