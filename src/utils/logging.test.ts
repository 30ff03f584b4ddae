import * as chai from "chai";
import * as sinon from "sinon";
import {configureLogging, parseLogLevel} from "./logging";
import log = require("loglevel");

describe("parseLogLevel()", () => {
    it("reads level names in any case", () => {
        chai.assert.equal(parseLogLevel("debug"), log.levels.DEBUG);
        chai.assert.equal(parseLogLevel("WARN"), log.levels.WARN);
        chai.assert.equal(parseLogLevel("Silent"), log.levels.SILENT);
    });

    it("falls back to the default", () => {
        chai.assert.equal(parseLogLevel(undefined), log.levels.INFO);
        chai.assert.equal(parseLogLevel(""), log.levels.INFO);
        chai.assert.equal(parseLogLevel("loud", log.levels.ERROR), log.levels.ERROR);
    });
});

describe("configureLogging()", () => {
    let consoleLog: sinon.SinonStub;

    beforeEach(() => {
        consoleLog = sinon.stub(console, "log");
    });

    afterEach(() => {
        consoleLog.restore();
        log.setLevel(log.levels.SILENT);
    });

    it("takes the level from LOG_LEVEL", () => {
        configureLogging({LOG_LEVEL: "warn"});
        chai.assert.equal(log.getLevel(), log.levels.WARN);
    });

    it("defaults to info", () => {
        configureLogging({});
        chai.assert.equal(log.getLevel(), log.levels.INFO);
    });

    it("prefixes messages with the level and writes them to console.log", () => {
        configureLogging({LOG_LEVEL: "warn"});
        log.info("not shown");
        log.warn("shown");

        sinon.assert.calledOnce(consoleLog);
        chai.assert.equal(consoleLog.firstCall.args.join(" "), "[WARN] shown");
    });
});
