/**
 * Binlog event type codes as written in byte 4 of every event header.
 * @see https://dev.mysql.com/doc/dev/mysql-server/latest/namespacemysql_1_1binlog_1_1event.html
 */
export enum EventType {
    UNKNOWN_EVENT = 0,
    START_EVENT_V3 = 1,
    QUERY_EVENT = 2,
    STOP_EVENT = 3,
    ROTATE_EVENT = 4,
    INTVAR_EVENT = 5,
    LOAD_EVENT = 6,
    SLAVE_EVENT = 7,
    CREATE_FILE_EVENT = 8,
    APPEND_BLOCK_EVENT = 9,
    EXEC_LOAD_EVENT = 10,
    DELETE_FILE_EVENT = 11,
    NEW_LOAD_EVENT = 12,
    RAND_EVENT = 13,
    USER_VAR_EVENT = 14,
    FORMAT_DESCRIPTION_EVENT = 15,
    XID_EVENT = 16,
    BEGIN_LOAD_QUERY_EVENT = 17,
    EXECUTE_LOAD_QUERY_EVENT = 18,
    TABLE_MAP_EVENT = 19,
    WRITE_ROWS_EVENT_V0 = 20,
    UPDATE_ROWS_EVENT_V0 = 21,
    DELETE_ROWS_EVENT_V0 = 22,
    WRITE_ROWS_EVENT_V1 = 23,
    UPDATE_ROWS_EVENT_V1 = 24,
    DELETE_ROWS_EVENT_V1 = 25,
    INCIDENT_EVENT = 26,
    HEARTBEAT_LOG_EVENT = 27,
    IGNORABLE_LOG_EVENT = 28,
    ROWS_QUERY_LOG_EVENT = 29,
    WRITE_ROWS_EVENT_V2 = 30,
    UPDATE_ROWS_EVENT_V2 = 31,
    DELETE_ROWS_EVENT_V2 = 32,
    GTID_LOG_EVENT = 33,
    ANONYMOUS_GTID_LOG_EVENT = 34,
    PREVIOUS_GTIDS_LOG_EVENT = 35,
    TRANSACTION_CONTEXT_EVENT = 36,
    VIEW_CHANGE_EVENT = 37,
    XA_PREPARE_LOG_EVENT = 38,
    PARTIAL_UPDATE_ROWS_EVENT = 39,
    TRANSACTION_PAYLOAD_EVENT = 40,
    HEARTBEAT_LOG_EVENT_V2 = 41
}

export namespace EventType {

    export type RowsEventType =
        EventType.WRITE_ROWS_EVENT_V0
        | EventType.UPDATE_ROWS_EVENT_V0
        | EventType.DELETE_ROWS_EVENT_V0
        | EventType.WRITE_ROWS_EVENT_V1
        | EventType.UPDATE_ROWS_EVENT_V1
        | EventType.DELETE_ROWS_EVENT_V1
        | EventType.WRITE_ROWS_EVENT_V2
        | EventType.UPDATE_ROWS_EVENT_V2
        | EventType.DELETE_ROWS_EVENT_V2;

    export function isKnown(code: number): code is EventType {
        return Number.isInteger(code) && code >= EventType.UNKNOWN_EVENT && code <= EventType.HEARTBEAT_LOG_EVENT_V2;
    }

    export function isRowsEvent(code: number): code is RowsEventType {
        return (code >= EventType.WRITE_ROWS_EVENT_V0 && code <= EventType.DELETE_ROWS_EVENT_V1)
            || (code >= EventType.WRITE_ROWS_EVENT_V2 && code <= EventType.DELETE_ROWS_EVENT_V2);
    }

    /**
     * The MySQL constant name of the code, or `UNKNOWN_0x..` when it isn't one.
     */
    export function getName(code: number): string {
        return isKnown(code) ? EventType[code] : `UNKNOWN_0x${code.toString(16).padStart(2, "0")}`;
    }
}
