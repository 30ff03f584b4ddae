import {BinlogDecodeError} from "../BinlogDecodeError";
import {BinlogCursor} from "../codec/BinlogCursor";
import {QueryPayload, QueryStatusVarKey, QueryStatusVars} from "../model/QueryPayload";

/**
 * Updated db names count meaning more databases than MAX_DBS_IN_EVENT_MTS were touched.
 */
const OVER_MAX_DBS_IN_EVENT_MTS = 254;

/**
 * Best effort decode of the status variables of a QUERY_EVENT.  Keys written
 * by newer servers than this knows about fail with UnknownStatusVar; the
 * QueryPayload itself stays usable.
 * @see https://dev.mysql.com/doc/internals/en/query-event.html
 */
export function decodeQueryStatusVars(payload: QueryPayload): QueryStatusVars {
    const cursor = new BinlogCursor(payload.statusVars);
    const vars: QueryStatusVars = {};

    while (cursor.remaining > 0) {
        const key = cursor.uint8();
        switch (key) {
            case QueryStatusVarKey.Flags2:
                vars.flags2 = cursor.uint32();
                break;
            case QueryStatusVarKey.SqlMode:
                vars.sqlMode = cursor.uint64();
                break;
            case QueryStatusVarKey.Catalog:
                vars.catalog = cursor.string(cursor.uint8());
                cursor.skip(1);     // 0x00
                break;
            case QueryStatusVarKey.AutoIncrement:
                vars.autoIncrement = {
                    increment: cursor.uint16(),
                    offset: cursor.uint16()
                };
                break;
            case QueryStatusVarKey.Charset:
                vars.charset = {
                    characterSetClient: cursor.uint16(),
                    collationConnection: cursor.uint16(),
                    collationServer: cursor.uint16()
                };
                break;
            case QueryStatusVarKey.TimeZone:
                vars.timeZone = cursor.string(cursor.uint8());
                break;
            case QueryStatusVarKey.CatalogNz:
                vars.catalog = cursor.string(cursor.uint8());
                break;
            case QueryStatusVarKey.LcTimeNames:
                vars.lcTimeNames = cursor.uint16();
                break;
            case QueryStatusVarKey.CharsetDatabase:
                vars.charsetDatabase = cursor.uint16();
                break;
            case QueryStatusVarKey.TableMapForUpdate:
                vars.tableMapForUpdate = cursor.uint64();
                break;
            case QueryStatusVarKey.MasterDataWritten:
                vars.masterDataWritten = cursor.uint32();
                break;
            case QueryStatusVarKey.Invoker:
                vars.invoker = {
                    user: cursor.string(cursor.uint8()),
                    host: cursor.string(cursor.uint8())
                };
                break;
            case QueryStatusVarKey.UpdatedDbNames:
                vars.updatedDbNames = readUpdatedDbNames(cursor);
                break;
            case QueryStatusVarKey.Microseconds:
                vars.microseconds = cursor.uint24();
                break;
            case QueryStatusVarKey.ExplicitDefaultsForTimestamp:
                vars.explicitDefaultsForTimestamp = cursor.uint8() !== 0;
                break;
            case QueryStatusVarKey.DdlLoggedWithXid:
                vars.ddlXid = cursor.uint64();
                break;
            case QueryStatusVarKey.DefaultCollationForUtf8mb4:
                vars.defaultCollationForUtf8mb4 = cursor.uint16();
                break;
            case QueryStatusVarKey.SqlRequirePrimaryKey:
                vars.sqlRequirePrimaryKey = cursor.uint8() !== 0;
                break;
            case QueryStatusVarKey.DefaultTableEncryption:
                vars.defaultTableEncryption = cursor.uint8() !== 0;
                break;
            default:
                throw new BinlogDecodeError("UnknownStatusVar", `Unknown status var 0x${key.toString(16)} at offset ${cursor.offset - 1}.`);
        }
    }

    return vars;
}

function readUpdatedDbNames(cursor: BinlogCursor): string[] | null {
    const count = cursor.uint8();
    if (count === OVER_MAX_DBS_IN_EVENT_MTS) {
        return null;
    }

    const names: string[] = [];
    for (let i = 0; i < count; i++) {
        names.push(cursor.nulTerminatedString());
    }
    return names;
}
