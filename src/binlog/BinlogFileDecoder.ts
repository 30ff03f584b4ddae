import {BinlogDecodeError} from "./BinlogDecodeError";
import {BinlogEventWindow, BinlogReaderOptions} from "./BinlogReaderOptions";
import {ByteSource} from "./byteSource/ByteSource";
import {FileByteSource} from "./byteSource/FileByteSource";
import {decodeEventHeader} from "./codec/eventHeader";
import {DecodeContext} from "./DecodeContext";
import {decodeEventBody} from "./decoders/decodeEventBody";
import {getFormatDescriptionChecksumAlgorithm} from "./decoders/decodeFormatDescription";
import {BinlogEvent} from "./model/BinlogEvent";
import {BinlogEventHeader} from "./model/BinlogEventHeader";
import {EventType} from "./model/EventType";
import {ChecksumAlgorithm} from "./model/FormatDescription";
import {validateEvent} from "./validateEvent";
import log = require("loglevel");

/**
 * A binlog file starts with [ fe 'bin' ].
 * @see https://dev.mysql.com/doc/internals/en/binlog-file-header.html
 */
export const BINLOG_MAGIC = Buffer.from([0xfe, 0x62, 0x69, 0x6e]);

export type BinlogDecoderState = "AwaitingMagic" | "Streaming" | "Finished";

export type DecodeResult =
    { status: "event", event: BinlogEvent }
    | { status: "skipped", header: BinlogEventHeader }
    | { status: "end", reason: "endOfStream" | "window" };

/**
 * Receives each delivered event.  Return false to stop the walk.  Throwing
 * also stops the walk and the error is rethrown from walkEvents().
 */
export type BinlogEventConsumer = (event: BinlogEvent) => boolean | Promise<boolean>;

/**
 * Decodes the events of one binlog stream in order.  Each event's header
 * width, checksum and table ids depend on events before it, so the decoder
 * keeps that in its own DecodeContext.
 */
export class BinlogFileDecoder {

    readonly context = new DecodeContext();
    private readonly window: BinlogEventWindow;
    private currentState: BinlogDecoderState = "AwaitingMagic";
    private bytesRead = 0;
    private error: unknown = null;
    private windowClosed = false;

    constructor(private readonly source: ByteSource, options?: BinlogReaderOptions) {
        this.window = new BinlogEventWindow(BinlogReaderOptions.normalize(options));
    }

    /**
     * Opens the binlog file at `path` and checks its magic header.
     */
    static async open(path: string, options?: BinlogReaderOptions): Promise<BinlogFileDecoder> {
        const source = await FileByteSource.open(path);
        try {
            const decoder = new BinlogFileDecoder(source, options);
            await decoder.readMagic();
            return decoder;
        } catch (err) {
            await source.close();
            throw err;
        }
    }

    get state(): BinlogDecoderState {
        return this.currentState;
    }

    /**
     * Offset in the stream of the next byte to be read.
     */
    get position(): number {
        return this.bytesRead;
    }

    /**
     * Reads and decodes the next event.  Events before the start of the
     * window are reported as skipped.  The end of the stream, or the end of
     * the window, is reported as end.
     */
    async decodeEvent(): Promise<DecodeResult> {
        if (this.currentState === "AwaitingMagic") {
            await this.readMagic();
        }
        if (this.currentState === "Finished") {
            if (this.error !== null) {
                throw this.error;
            }
            return {status: "end", reason: this.windowClosed ? "window" : "endOfStream"};
        }

        try {
            return await this.decodeNextEvent();
        } catch (err) {
            if (BinlogDecodeError.isBinlogDecodeError(err) && !err.fatal) {
                log.warn("BinlogFileDecoder skipping event after recoverable error", err.message);
                throw err;
            }
            this.fail(err);
            throw err;
        }
    }

    /**
     * Delivers every event in the window to `consumer` until the stream ends,
     * the window closes or the consumer asks to stop.
     */
    async walkEvents(consumer: BinlogEventConsumer): Promise<void> {
        log.info("BinlogFileDecoder walking events from position", this.bytesRead);
        let delivered = 0;
        while (true) {
            const res = await this.decodeEvent();
            if (res.status === "end") {
                break;
            }
            if (res.status === "skipped") {
                continue;
            }

            delivered++;
            const isContinue = await consumer(res.event);
            if (!isContinue) {
                log.info("BinlogFileDecoder consumer stopped the walk at position", this.bytesRead);
                break;
            }
        }
        log.info("BinlogFileDecoder walked", delivered, "events");
    }

    async close(): Promise<void> {
        this.currentState = "Finished";
        await this.source.close();
    }

    private async readMagic(): Promise<void> {
        let magic: Buffer | null;
        try {
            magic = await this.source.readExactly(BINLOG_MAGIC.length);
        } catch (err) {
            if (BinlogDecodeError.hasCode(err, "Truncated")) {
                const error = new BinlogDecodeError("InvalidFileHeader", "Invalid binary log header, the stream is shorter than the header.");
                this.fail(error);
                throw error;
            }
            this.fail(err);
            throw err;
        }
        if (!magic || !magic.equals(BINLOG_MAGIC)) {
            const error = new BinlogDecodeError("InvalidFileHeader", `Invalid binary log header {${magic ? magic.toString("hex") : ""}}.`);
            this.fail(error);
            throw error;
        }
        this.bytesRead = BINLOG_MAGIC.length;
        this.currentState = "Streaming";
    }

    private async decodeNextEvent(): Promise<DecodeResult> {
        const headerWidth = this.context.headerWidth();
        const headerBytes = await this.source.readExactly(headerWidth);
        if (!headerBytes) {
            log.debug("BinlogFileDecoder reached the end of the stream at position", this.bytesRead);
            this.currentState = "Finished";
            return {status: "end", reason: "endOfStream"};
        }
        this.bytesRead += headerBytes.length;

        const header = decodeEventHeader(headerBytes, headerWidth);
        if (!EventType.isKnown(header.eventType)) {
            throw new BinlogDecodeError("UnknownEventType", `Got unknown event type {0x${header.eventType.toString(16)}}.`, header);
        }
        if (header.eventSize < headerWidth) {
            throw new BinlogDecodeError("SizeMismatch", `Event size ${header.eventSize} is smaller than the ${headerWidth} byte header.`, header);
        }

        const bodyBytes = await this.source.readExactly(header.eventSize - headerWidth);
        if (!bodyBytes) {
            throw new BinlogDecodeError("Truncated", `Stream ended before the body of ${EventType.getName(header.eventType)}.`, header);
        }
        this.bytesRead += bodyBytes.length;

        // The format description is always adopted so the events that follow can be framed.
        // Table maps are registered so rows events just inside the window can find them.
        const isFormatDescription = header.eventType === EventType.FORMAT_DESCRIPTION_EVENT;
        if (!isFormatDescription && !this.window.isStarted(header)) {
            if (header.eventType === EventType.TABLE_MAP_EVENT) {
                this.decodeBody(header, headerBytes, bodyBytes);
            }
            return {status: "skipped", header};
        }

        const event = this.decodeBody(header, headerBytes, bodyBytes);
        log.debug("BinlogFileDecoder decoded", BinlogEventHeader.toString(header));
        if (this.window.isStopped(header)) {
            log.info("BinlogFileDecoder reached the end of the window at", BinlogEventHeader.toString(header));
            this.currentState = "Finished";
            this.windowClosed = true;
            return {status: "end", reason: "window"};
        }

        if (isFormatDescription && !this.window.isStarted(header)) {
            return {status: "skipped", header};
        }
        return {status: "event", event};
    }

    /**
     * Validates and decodes one event and applies it to the context.
     */
    private decodeBody(header: BinlogEventHeader, headerBytes: Buffer, bodyBytes: Buffer): BinlogEvent {
        try {
            const checksumAlgorithm = header.eventType === EventType.FORMAT_DESCRIPTION_EVENT
                ? getFormatDescriptionChecksumAlgorithm(bodyBytes)
                : this.context.checksumAlgorithm();
            const validated = validateEvent(headerBytes, bodyBytes, header.eventSize, checksumAlgorithm);
            const body = decodeEventBody(header.eventType, validated.body, this.context, checksumAlgorithm === ChecksumAlgorithm.Crc32);

            switch (body.kind) {
                case "formatDescription":
                    log.debug("BinlogFileDecoder adopting format description", body.serverVersion, "binlog version", body.binlogVersion, "checksum", ChecksumAlgorithm[body.checksumAlgorithm]);
                    this.context.adoptFormatDescription(body);
                    break;
                case "tableMap":
                    log.debug("BinlogFileDecoder registering table", body.tableId, `${body.schemaName}.${body.tableName}`);
                    this.context.registerTable(body);
                    break;
            }

            return {
                header,
                body,
                checksum: validated.checksum
            };
        } catch (err) {
            if (BinlogDecodeError.isBinlogDecodeError(err) && !err.header) {
                throw new BinlogDecodeError(err.code, `${err.message} (${BinlogEventHeader.toString(header)})`, header);
            }
            throw err;
        }
    }

    private fail(err: unknown): void {
        this.currentState = "Finished";
        this.error = err;
        log.error("BinlogFileDecoder failed at position", this.bytesRead, err);
    }
}
