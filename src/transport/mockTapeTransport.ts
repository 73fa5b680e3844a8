import type { TapeTransport } from './tapeTransport';

export type MockTransportCall =
	| { kind: 'write'; data: Uint8Array }
	| { kind: 'drain' }
	| { kind: 'flushInput' }
	| { kind: 'setBaudRate'; baudRate: number }
	| { kind: 'close' };

export type MockTransportFailure = (call: MockTransportCall) => Error | undefined;

/**
 * In-memory transport that records every call in order.
 */
export class MockTapeTransport implements TapeTransport {
	public readonly calls: MockTransportCall[] = [];
	public baudRate: number;

	private opened = true;
	private readonly failure?: MockTransportFailure;

	public constructor(public readonly path = 'mock', baudRate = 115_200, failure?: MockTransportFailure) {
		this.baudRate = baudRate;
		this.failure = failure;
	}

	public get isOpen(): boolean {
		return this.opened;
	}

	/** Payloads of every write, in order. */
	public get writes(): Uint8Array[] {
		return this.calls.flatMap((call) => (call.kind === 'write' ? [call.data] : []));
	}

	/** All written bytes concatenated, as they would appear on the wire. */
	public wireBytes(): number[] {
		return this.writes.flatMap((data) => Array.from(data));
	}

	public async write(data: Uint8Array): Promise<void> {
		this.record({ kind: 'write', data: data.slice() });
	}

	public async drain(): Promise<void> {
		this.record({ kind: 'drain' });
	}

	public async flushInput(): Promise<void> {
		this.record({ kind: 'flushInput' });
	}

	public async setBaudRate(baudRate: number): Promise<void> {
		this.record({ kind: 'setBaudRate', baudRate });
		this.baudRate = baudRate;
	}

	public async close(): Promise<void> {
		this.record({ kind: 'close' });
		this.opened = false;
	}

	private record(call: MockTransportCall): void {
		if (!this.opened) {
			throw new Error('Mock transport is not open.');
		}

		const error = this.failure?.(call);
		if (error) {
			throw error;
		}
		this.calls.push(call);
	}
}
