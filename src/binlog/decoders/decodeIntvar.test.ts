import * as chai from "chai";
import {decodeIntvar} from "./decodeIntvar";
import {IntvarType} from "../model/BinlogEvent";
import {uint64} from "../../utils/testUtils/BinlogFixtureBuilder";

describe("decodeIntvar()", () => {
    it("reads the type and value", () => {
        chai.assert.deepEqual(decodeIntvar(Buffer.concat([Buffer.from([2]), uint64(1001n)])), {
            kind: "intvar",
            type: IntvarType.InsertId,
            value: 1001n
        });
    });

    it("keeps types it doesn't name", () => {
        chai.assert.equal(decodeIntvar(Buffer.concat([Buffer.from([9]), uint64(0n)])).type, 9);
    });
});
