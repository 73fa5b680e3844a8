/**
 * Byte-stream link to the tape firmware. Every method resolves once the
 * underlying port has completed the request.
 */
export interface TapeTransport {
	write(data: Uint8Array): Promise<void>;
	/** Waits until queued outbound bytes have been handed to the device. */
	drain(): Promise<void>;
	/** Discards inbound bytes the device may have sent. */
	flushInput(): Promise<void>;
	setBaudRate(baudRate: number): Promise<void>;
	close(): Promise<void>;
}

export type TransportOpener = (path: string, baudRate: number) => Promise<TapeTransport>;

export type PortDiscovery = () => Promise<string[]>;
