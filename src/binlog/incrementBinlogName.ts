const BINLOG_NAME_MATCHER = /^(.*)\.(\d+)$/;

/**
 * The file the server writes after `binlogName`, eg: mysql-bin.000020 is
 * followed by mysql-bin.000021.  Null when the name has no numeric extension.
 */
export function incrementBinlogName(binlogName: string): string | null {
    const match = BINLOG_NAME_MATCHER.exec(binlogName);
    if (!match) {
        return null;
    }
    const [, basename, sequence] = match;
    const next = (BigInt(sequence) + 1n).toString().padStart(sequence.length, "0");
    return `${basename}.${next}`;
}
