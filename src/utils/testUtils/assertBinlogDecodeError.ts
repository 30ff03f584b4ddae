import * as chai from "chai";
import {BinlogDecodeError} from "../../binlog/BinlogDecodeError";

/**
 * Asserts that `fn` throws a BinlogDecodeError with the given code and returns it.
 */
export function assertThrowsBinlogDecodeError(fn: () => unknown, code: BinlogDecodeError.Code): BinlogDecodeError {
    try {
        fn();
    } catch (err) {
        return checkBinlogDecodeError(err, code);
    }
    return chai.assert.fail(`Expected a ${code} BinlogDecodeError but nothing was thrown.`);
}

/**
 * Asserts that `promise` rejects with a BinlogDecodeError with the given code and returns it.
 */
export async function assertRejectsBinlogDecodeError(promise: Promise<unknown>, code: BinlogDecodeError.Code): Promise<BinlogDecodeError> {
    try {
        await promise;
    } catch (err) {
        return checkBinlogDecodeError(err, code);
    }
    return chai.assert.fail(`Expected a ${code} BinlogDecodeError but the promise resolved.`);
}

function checkBinlogDecodeError(err: unknown, code: BinlogDecodeError.Code): BinlogDecodeError {
    if (!BinlogDecodeError.isBinlogDecodeError(err)) {
        return chai.assert.fail(`Expected a ${code} BinlogDecodeError but got ${err}.`);
    }
    chai.assert.equal(err.code, code, err.message);
    return err;
}
