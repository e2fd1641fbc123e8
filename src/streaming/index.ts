export { readSseData } from './sse'
export {
  type ChunkSink,
  DEFAULT_RELAY_BUFFER_SIZE,
  type RelayHandle,
  type RelayOptions,
  type RelayResult,
  type RelayStatus,
  StreamInterruptedError,
  StreamRelay,
  type StreamSource
} from './relay'
