import {BinlogDecodeError} from "../BinlogDecodeError";
import {DecodeContext} from "../DecodeContext";
import {BinlogEventBody} from "../model/BinlogEvent";
import {EventType} from "../model/EventType";
import {decodeFormatDescription} from "./decodeFormatDescription";
import {decodeIntvar} from "./decodeIntvar";
import {decodeQuery} from "./decodeQuery";
import {decodeRotate} from "./decodeRotate";
import {decodeRows} from "./decodeRows";
import {decodeTableMap} from "./decodeTableMap";
import {decodeXid} from "./decodeXid";

/**
 * Decodes a validated event body by type.  Reads the context but never
 * changes it; adopting a format description or registering a table map is
 * left to the caller.
 * @param checksumRemoved Whether validation split a checksum off the body.
 */
export function decodeEventBody(eventType: EventType, body: Buffer, context: DecodeContext, checksumRemoved: boolean): BinlogEventBody {
    switch (eventType) {
        case EventType.FORMAT_DESCRIPTION_EVENT:
            return decodeFormatDescription(body, checksumRemoved);
        case EventType.QUERY_EVENT:
            return decodeQuery(body, context.binlogVersion());
        case EventType.XID_EVENT:
            return decodeXid(body);
        case EventType.INTVAR_EVENT:
            return decodeIntvar(body);
        case EventType.ROTATE_EVENT:
            return decodeRotate(body, context.binlogVersion());
        case EventType.TABLE_MAP_EVENT:
            return decodeTableMap(body, context.formatDescription);
        case EventType.WRITE_ROWS_EVENT_V0:
        case EventType.UPDATE_ROWS_EVENT_V0:
        case EventType.DELETE_ROWS_EVENT_V0:
        case EventType.WRITE_ROWS_EVENT_V1:
        case EventType.UPDATE_ROWS_EVENT_V1:
        case EventType.DELETE_ROWS_EVENT_V1:
        case EventType.WRITE_ROWS_EVENT_V2:
        case EventType.UPDATE_ROWS_EVENT_V2:
        case EventType.DELETE_ROWS_EVENT_V2: {
            const rows = decodeRows(body, context.formatDescription, eventType);
            return {
                ...rows,
                table: context.tableSchema(rows.tableId)
            };
        }
        case EventType.UNKNOWN_EVENT:
            throw new BinlogDecodeError("UnknownEventType", "Got UNKNOWN_EVENT.");
        default:
            // Recognized but not interpreted, eg: GTID events.
            return {
                kind: "unsupported",
                data: body
            };
    }
}
