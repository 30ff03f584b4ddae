/**
 * QUERY_EVENT body.
 * @see https://dev.mysql.com/doc/internals/en/query-event.html
 */
export interface QueryPayload {
    kind: "query";
    slaveProxyId: number;
    executionTime: number;
    errorCode: number;

    /**
     * Raw status variables.  Decode with decodeQueryStatusVars().
     */
    statusVars: Buffer;
    schema: string;
    query: string;
}

/**
 * Status variable keys of a QUERY_EVENT.
 */
export enum QueryStatusVarKey {
    Flags2 = 0,
    SqlMode = 1,
    Catalog = 2,
    AutoIncrement = 3,
    Charset = 4,
    TimeZone = 5,
    CatalogNz = 6,
    LcTimeNames = 7,
    CharsetDatabase = 8,
    TableMapForUpdate = 9,
    MasterDataWritten = 10,
    Invoker = 11,
    UpdatedDbNames = 12,
    Microseconds = 13,
    ExplicitDefaultsForTimestamp = 16,
    DdlLoggedWithXid = 17,
    DefaultCollationForUtf8mb4 = 18,
    SqlRequirePrimaryKey = 19,
    DefaultTableEncryption = 20
}

/**
 * The status variables that were present in a QUERY_EVENT.
 */
export interface QueryStatusVars {
    flags2?: number;
    sqlMode?: bigint;
    catalog?: string;
    autoIncrement?: {
        increment: number;
        offset: number;
    };
    charset?: {
        characterSetClient: number;
        collationConnection: number;
        collationServer: number;
    };
    timeZone?: string;
    lcTimeNames?: number;
    charsetDatabase?: number;
    tableMapForUpdate?: bigint;
    masterDataWritten?: number;
    invoker?: {
        user: string;
        host: string;
    };

    /**
     * `null` when more databases were updated than the server tracks.
     */
    updatedDbNames?: string[] | null;
    microseconds?: number;
    explicitDefaultsForTimestamp?: boolean;
    ddlXid?: bigint;
    defaultCollationForUtf8mb4?: number;
    sqlRequirePrimaryKey?: boolean;
    defaultTableEncryption?: boolean;
}
