import * as chai from "chai";
import {EventType} from "./EventType";
import {ChecksumAlgorithm, FormatDescription} from "./FormatDescription";

describe("FormatDescription", () => {
    function getDescription(tableMapPostHeaderLength: number): FormatDescription {
        const eventTypeHeaderLengths = Buffer.alloc(EventType.HEARTBEAT_LOG_EVENT_V2);
        eventTypeHeaderLengths[EventType.TABLE_MAP_EVENT - 1] = tableMapPostHeaderLength;
        return {
            kind: "formatDescription",
            binlogVersion: 4,
            serverVersion: "5.1.73",
            createTimestamp: 0,
            headerLength: 19,
            eventTypeHeaderLengths,
            checksumAlgorithm: ChecksumAlgorithm.Undefined,
            checksumEnabled: false
        };
    }

    describe("getEventTypeHeaderLength()", () => {
        it("indexes the table by type code - 1", () => {
            chai.assert.equal(FormatDescription.getEventTypeHeaderLength(getDescription(8), EventType.TABLE_MAP_EVENT), 8);
        });

        it("is undefined past the end of the table", () => {
            const description = getDescription(8);
            description.eventTypeHeaderLengths = description.eventTypeHeaderLengths.subarray(0, 19);
            chai.assert.isUndefined(FormatDescription.getEventTypeHeaderLength(description, EventType.WRITE_ROWS_EVENT_V2));
        });
    });

    describe("getTableIdWidth()", () => {
        it("is 4 when the post header is 6 bytes", () => {
            chai.assert.equal(FormatDescription.getTableIdWidth(getDescription(6), EventType.TABLE_MAP_EVENT), 4);
        });

        it("is 6 otherwise", () => {
            chai.assert.equal(FormatDescription.getTableIdWidth(getDescription(8), EventType.TABLE_MAP_EVENT), 6);
        });

        it("is 6 without a format description", () => {
            chai.assert.equal(FormatDescription.getTableIdWidth(null, EventType.TABLE_MAP_EVENT), 6);
        });
    });
});
