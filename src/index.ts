export * from "./binlog/BinlogDecodeError";
export * from "./binlog/BinlogFileDecoder";
export * from "./binlog/BinlogReaderOptions";
export * from "./binlog/DecodeContext";
export * from "./binlog/byteSource/ByteSource";
export * from "./binlog/byteSource/BufferByteSource";
export * from "./binlog/byteSource/FileByteSource";
export * from "./binlog/codec/BinlogCursor";
export * from "./binlog/codec/crc32";
export * from "./binlog/codec/eventHeader";
export * from "./binlog/codec/primitives";
export * from "./binlog/decoders/decodeEventBody";
export * from "./binlog/decoders/decodeFormatDescription";
export * from "./binlog/decoders/decodeIntvar";
export * from "./binlog/decoders/decodeQuery";
export * from "./binlog/decoders/decodeQueryStatusVars";
export * from "./binlog/decoders/decodeRotate";
export * from "./binlog/decoders/decodeRows";
export * from "./binlog/decoders/decodeTableMap";
export * from "./binlog/decoders/decodeXid";
export * from "./binlog/incrementBinlogName";
export * from "./binlog/model/BinlogEvent";
export * from "./binlog/model/BinlogEventHeader";
export * from "./binlog/model/Bitfield";
export * from "./binlog/model/ColumnType";
export * from "./binlog/model/EventType";
export * from "./binlog/model/FormatDescription";
export * from "./binlog/model/QueryPayload";
export * from "./binlog/model/RowsPayload";
export * from "./binlog/model/TableSchema";
export * from "./binlog/validateEvent";
export * from "./binlog/walkBinlogFiles";
export * from "./utils/logging";
