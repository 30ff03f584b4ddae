import * as chai from "chai";
import {decodeQueryStatusVars} from "./decodeQueryStatusVars";
import {QueryPayload} from "../model/QueryPayload";
import {assertThrowsBinlogDecodeError} from "../../utils/testUtils/assertBinlogDecodeError";
import {uint16, uint32, uint64} from "../../utils/testUtils/BinlogFixtureBuilder";

describe("decodeQueryStatusVars()", () => {
    function getPayload(...statusVars: Buffer[]): QueryPayload {
        return {
            kind: "query",
            slaveProxyId: 1,
            executionTime: 0,
            errorCode: 0,
            statusVars: Buffer.concat(statusVars),
            schema: "shop",
            query: "BEGIN"
        };
    }

    function lengthPrefixed(value: string): Buffer {
        return Buffer.concat([Buffer.from([value.length]), Buffer.from(value, "utf8")]);
    }

    it("decodes nothing from an empty block", () => {
        chai.assert.deepEqual(decodeQueryStatusVars(getPayload()), {});
    });

    it("decodes the variables a MySQL 8 server writes", () => {
        const vars = decodeQueryStatusVars(getPayload(
            Buffer.from([0x00]), uint32(0),
            Buffer.from([0x01]), uint64(0x0000000054200000n),
            Buffer.from([0x06]), lengthPrefixed("std"),
            Buffer.from([0x04]), uint16(255), uint16(255), uint16(255),
            Buffer.from([0x05]), lengthPrefixed("SYSTEM"),
            Buffer.from([0x0c]), Buffer.from([1]), Buffer.from("shop\0", "utf8"),
            Buffer.from([0x12]), uint16(255)
        ));
        chai.assert.deepEqual(vars, {
            flags2: 0,
            sqlMode: 0x0000000054200000n,
            catalog: "std",
            charset: {
                characterSetClient: 255,
                collationConnection: 255,
                collationServer: 255
            },
            timeZone: "SYSTEM",
            updatedDbNames: ["shop"],
            defaultCollationForUtf8mb4: 255
        });
    });

    it("decodes the remaining variables", () => {
        const vars = decodeQueryStatusVars(getPayload(
            Buffer.from([0x02]), lengthPrefixed("def"), Buffer.from([0]),
            Buffer.from([0x03]), uint16(2), uint16(1),
            Buffer.from([0x07]), uint16(0),
            Buffer.from([0x08]), uint16(33),
            Buffer.from([0x09]), uint64(3n),
            Buffer.from([0x0a]), uint32(42),
            Buffer.from([0x0b]), lengthPrefixed("root"), lengthPrefixed("localhost"),
            Buffer.from([0x0d, 0xa0, 0x86, 0x01]),
            Buffer.from([0x10, 0x01]),
            Buffer.from([0x11]), uint64(99n),
            Buffer.from([0x13, 0x00]),
            Buffer.from([0x14, 0x01])
        ));
        chai.assert.deepEqual(vars, {
            catalog: "def",
            autoIncrement: {increment: 2, offset: 1},
            lcTimeNames: 0,
            charsetDatabase: 33,
            tableMapForUpdate: 3n,
            masterDataWritten: 42,
            invoker: {user: "root", host: "localhost"},
            microseconds: 100000,
            explicitDefaultsForTimestamp: true,
            ddlXid: 99n,
            sqlRequirePrimaryKey: false,
            defaultTableEncryption: true
        });
    });

    it("decodes several updated database names", () => {
        const vars = decodeQueryStatusVars(getPayload(Buffer.from([0x0c, 0x02]), Buffer.from("shop\0crm\0", "utf8")));
        chai.assert.deepEqual(vars.updatedDbNames, ["shop", "crm"]);
    });

    it("decodes too many updated databases as null", () => {
        const vars = decodeQueryStatusVars(getPayload(Buffer.from([0x0c, 254])));
        chai.assert.isNull(vars.updatedDbNames);
    });

    it("throws UnknownStatusVar for keys it doesn't know", () => {
        const err = assertThrowsBinlogDecodeError(() => decodeQueryStatusVars(getPayload(Buffer.from([0x00]), uint32(0), Buffer.from([0x0e, 0x00]))), "UnknownStatusVar");
        chai.assert.equal(err.message, "Unknown status var 0xe at offset 5.");
        chai.assert.isFalse(err.fatal);
    });

    it("throws Truncated when a value is cut off", () => {
        assertThrowsBinlogDecodeError(() => decodeQueryStatusVars(getPayload(Buffer.from([0x01, 0x00, 0x00]))), "Truncated");
    });
});
