export { TapeSession, withTapeSession, DEFAULT_LED_COUNT, DEFAULT_BUFFERED } from './device/tapeSession';
export type { TapeSessionOptions } from './device/tapeSession';
export {
	BYTES_PER_PIXEL,
	CONTROL_TRIPLET,
	MAX_CHANNEL_VALUE,
	SHOW_SENTINEL,
	TAPE_BAUD_RATE,
	clampChannel,
	controlTriplet,
	encodePixel,
	encodePixels
} from './protocol/pixelEncoder';
export type { Pixel } from './protocol/pixelEncoder';
export type { PortDiscovery, TapeTransport, TransportOpener } from './transport/tapeTransport';
export { SerialPortTransport, openSerialPortTransport } from './transport/serialPortTransport';
export { TAPE_USB_IDENTITY, listSerialCandidates, listTapePorts, matchesUsbIdentity } from './transport/discovery';
export type { SerialCandidate, UsbIdentity } from './transport/discovery';
export { MockTapeTransport } from './transport/mockTapeTransport';
export type { MockTransportCall, MockTransportFailure } from './transport/mockTapeTransport';
export { DriverError } from './errors/DriverError';
export { TapeError, TAPE_ERROR_MESSAGES, isTapeError } from './errors/TapeError';
export type { TapeErrorCode } from './errors/TapeError';
export { LineLogger, NoopLogger, LOG_LEVELS, createStderrLogger } from './diagnostics/logger';
export type { LogLevel, Logger } from './diagnostics/logger';
export { readTapeConfig, normalizeTapeConfig, toSessionOptions } from './config/tapeConfig';
export type { TapeConfigSnapshot } from './config/tapeConfig';
