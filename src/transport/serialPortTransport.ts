import type { TapeTransport } from './tapeTransport';

type PortCallback = (error?: Error | null) => void;

export interface SerialPortLike {
	open(callback: PortCallback): void;
	close(callback: PortCallback): void;
	write(data: Buffer, callback: PortCallback): boolean;
	drain(callback: PortCallback): void;
	flush(callback: PortCallback): void;
	update(options: { baudRate: number }, callback: PortCallback): void;
	removeAllListeners(event?: string): this;
	on(event: 'error', listener: (error: Error) => void): this;
}

export type SerialPortCtor = new (options: {
	path: string;
	baudRate: number;
	autoOpen: boolean;
}) => SerialPortLike;

export function loadSerialPortCtor(): SerialPortCtor {
	try {
		// eslint-disable-next-line @typescript-eslint/no-var-requires
		const mod = require('serialport') as
			| { SerialPort?: SerialPortCtor }
			| SerialPortCtor;

		if (typeof mod === 'function') {
			return mod;
		}

		if (mod && typeof mod === 'object' && typeof mod.SerialPort === 'function') {
			return mod.SerialPort;
		}
	} catch (error) {
		const detail = error instanceof Error ? error.message : String(error);
		throw new Error(`Serial tape transport requires package "serialport". (${detail})`);
	}

	throw new Error('Serial tape transport could not load serialport module.');
}

function callPort(invoke: (callback: PortCallback) => void): Promise<void> {
	return new Promise<void>((resolve, reject) => {
		invoke((error?: Error | null) => {
			if (error) {
				reject(error);
				return;
			}
			resolve();
		});
	});
}

export class SerialPortTransport implements TapeTransport {
	private port?: SerialPortLike;
	private lastError?: Error;

	public constructor(
		public readonly path: string,
		port: SerialPortLike
	) {
		this.port = port;
		port.on('error', (error) => {
			this.lastError = error;
		});
	}

	public async write(data: Uint8Array): Promise<void> {
		const port = this.requirePort();
		await callPort((callback) => {
			port.write(Buffer.from(data), callback);
		});
	}

	public async drain(): Promise<void> {
		const port = this.requirePort();
		await callPort((callback) => port.drain(callback));
	}

	public async flushInput(): Promise<void> {
		const port = this.requirePort();
		// serialport flushes both directions; outbound is already drained by the caller.
		await callPort((callback) => port.flush(callback));
	}

	public async setBaudRate(baudRate: number): Promise<void> {
		const port = this.requirePort();
		await callPort((callback) => port.update({ baudRate }, callback));
	}

	public async close(): Promise<void> {
		const port = this.port;
		this.port = undefined;
		if (!port) {
			return;
		}

		try {
			await callPort((callback) => port.close(callback));
		} finally {
			port.removeAllListeners();
		}
	}

	private requirePort(): SerialPortLike {
		if (!this.port) {
			throw new Error(`Serial port ${this.path} is not open.`);
		}
		if (this.lastError) {
			const error = this.lastError;
			this.lastError = undefined;
			throw error;
		}
		return this.port;
	}
}

export async function openSerialPortTransport(
	path: string,
	baudRate: number,
	SerialPort: SerialPortCtor = loadSerialPortCtor()
): Promise<SerialPortTransport> {
	if (!path) {
		throw new Error('Serial tape transport requires non-empty serial port path (for example /dev/ttyACM0).');
	}

	const port = new SerialPort({ path, baudRate, autoOpen: false });
	await callPort((callback) => port.open(callback));
	return new SerialPortTransport(path, port);
}
