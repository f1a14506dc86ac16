export * from './signal.js';
export {
  type RawFrame,
  decodeFrame,
  parseSignal,
  decompress,
  encodeHeartbeat,
  parseEventData,
} from './codec.js';
