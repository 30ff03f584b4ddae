import * as chai from "chai";
import {crc32} from "./crc32";

describe("crc32()", () => {
    it("matches the CRC-32 check value", () => {
        chai.assert.equal(crc32(Buffer.from("123456789", "ascii")), 0xcbf43926);
    });

    it("is 0 for no bytes", () => {
        chai.assert.equal(crc32(), 0);
        chai.assert.equal(crc32(Buffer.alloc(0)), 0);
    });

    it("gives the same result for chunks as for their concatenation", () => {
        const a = Buffer.from("12345", "ascii");
        const b = Buffer.from("6789", "ascii");
        chai.assert.equal(crc32(a, b), 0xcbf43926);
    });

    it("is unsigned", () => {
        chai.assert.isAtLeast(crc32(Buffer.from([0xff, 0xff, 0xff, 0xff])), 0);
    });
});
