export { ByteAccumulator } from "./byteAccumulator.js";
export { FrameDecoder, decodeFrames, type DecoderPhase } from "./decoder.js";
export { encodeEvent, encodeEvents } from "./encoder.js";
export {
  EncodeError,
  IncompleteFrameError,
  ProtocolError,
  ReadAbortedError,
  StreamClosedError,
  TelemetryError,
  TransportError,
  isTelemetryError,
  type TelemetryErrorCode,
} from "./errors.js";
export { readEvents, type ReadEventsOptions } from "./reader.js";
export {
  FRAME_SCHEMAS,
  MAX_TEXT_BYTES,
  MAX_U32,
  headerSize,
  isEventTag,
  schemaForTag,
  type FrameSchema,
} from "./schema.js";
export { FrameWriter, writeWithBackpressure } from "./writer.js";
