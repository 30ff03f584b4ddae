import * as fs from "fs";
import * as path from "path";
import {BinlogFileDecoder} from "./BinlogFileDecoder";
import {BinlogReaderOptions} from "./BinlogReaderOptions";
import {incrementBinlogName} from "./incrementBinlogName";
import {BinlogEvent} from "./model/BinlogEvent";
import {EventType} from "./model/EventType";
import log = require("loglevel");

/**
 * An event and the name of the binlog file it was read from.
 */
export interface BinlogFileEvent<T extends BinlogEvent = BinlogEvent> {
    binlog: T;
    binlogName: string;
}

export type BinlogFileEventConsumer = (event: BinlogFileEvent) => boolean | Promise<boolean>;

/**
 * Walks a sequence of rotated binlog files starting at `firstPath`.  The
 * next file is the one named by the last Rotate event, looked for beside the
 * current file.  A file that ends with a Stop event (server shutdown) is
 * followed by the next file number.
 *
 * Every file gets its own decoder, so table maps don't carry across files.
 * `options` apply to the first file; later files only honour the time bounds.
 */
export async function walkBinlogFiles(firstPath: string, consumer: BinlogFileEventConsumer, options: BinlogReaderOptions = {}): Promise<void> {
    let binlogPath: string | null = firstPath;
    let fileOptions = options;

    while (binlogPath) {
        const binlogName = path.basename(binlogPath);
        log.info("walkBinlogFiles reading", binlogName);

        const decoder = await BinlogFileDecoder.open(binlogPath, fileOptions);
        let nextBinlogName: string | null = null;
        let lastEventType: EventType | null = null;
        try {
            while (true) {
                const res = await decoder.decodeEvent();
                if (res.status === "end") {
                    if (res.reason === "window") {
                        return;
                    }
                    break;
                }

                const header = res.status === "event" ? res.event.header : res.header;
                lastEventType = header.eventType;
                if (res.status === "skipped") {
                    continue;
                }

                const event = res.event;
                if (BinlogEvent.isKind(event, "rotate") && event.body.fileName !== binlogName) {
                    nextBinlogName = event.body.fileName;
                }
                if (!await consumer({binlog: event, binlogName})) {
                    log.info("walkBinlogFiles consumer stopped in", binlogName, "at position", decoder.position);
                    return;
                }
            }
        } finally {
            await decoder.close();
        }

        if (lastEventType === EventType.STOP_EVENT || (lastEventType === EventType.ROTATE_EVENT && !nextBinlogName)) {
            nextBinlogName = incrementBinlogName(binlogName);
        }
        binlogPath = nextBinlogName ? await findSibling(binlogPath, nextBinlogName) : null;
        fileOptions = {
            startTime: options.startTime,
            endTime: options.endTime
        };
    }
    log.info("walkBinlogFiles has no further binlog to read");
}

async function findSibling(binlogPath: string, binlogName: string): Promise<string | null> {
    const siblingPath = path.join(path.dirname(binlogPath), path.basename(binlogName));
    try {
        await fs.promises.access(siblingPath, fs.constants.R_OK);
        return siblingPath;
    } catch (err) {
        log.info("walkBinlogFiles next binlog", siblingPath, "is not readable", err);
        return null;
    }
}
