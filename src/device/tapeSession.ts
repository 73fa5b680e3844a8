import { NoopLogger } from '../diagnostics/logger';
import type { Logger } from '../diagnostics/logger';
import { TapeError, TAPE_ERROR_MESSAGES, describeCause } from '../errors/TapeError';
import type { TapeErrorCode } from '../errors/TapeError';
import {
	BYTES_PER_PIXEL,
	CONTROL_TRIPLET,
	TAPE_BAUD_RATE,
	controlTriplet,
	encodePixel,
	encodePixels
} from '../protocol/pixelEncoder';
import { listTapePorts } from '../transport/discovery';
import { openSerialPortTransport } from '../transport/serialPortTransport';
import type { Pixel } from '../protocol/pixelEncoder';
import type { PortDiscovery, TapeTransport, TransportOpener } from '../transport/tapeTransport';

export const DEFAULT_LED_COUNT = 60;
export const DEFAULT_BUFFERED = true;

export interface TapeSessionOptions {
	/** Serial port path. Omit to pick the first port reported by `discovery`. */
	port?: string;
	ledCount?: number;
	/** Accumulate pixels locally until `show()`. */
	buffered?: boolean;
	discovery?: PortDiscovery;
	openTransport?: TransportOpener;
	logger?: Logger;
}

interface TapeSessionInit {
	transport: TapeTransport;
	port: string;
	ledCount: number;
	buffered: boolean;
	logger: Logger;
}

function tapeError(code: TapeErrorCode, op: string, port?: string, cause?: unknown, detail?: string): TapeError {
	const base = TAPE_ERROR_MESSAGES[code];
	return new TapeError({
		code,
		message: detail ? `${base} (${detail})` : base,
		op,
		port,
		cause
	});
}

async function resolvePort(options: TapeSessionOptions, logger: Logger): Promise<string> {
	if (options.port) {
		return options.port;
	}

	const discovery = options.discovery ?? (() => listTapePorts());
	const candidates = await discovery();
	const [first] = candidates;
	if (first === undefined) {
		throw tapeError('NOT_FOUND', 'open', undefined, undefined, 'no compatible device detected');
	}

	logger.info('Tape port auto-selected', { port: first, candidates });
	return first;
}

/**
 * Driver for one LED tape on an open serial link.
 *
 * In buffered mode pixels collect in a fixed-size accumulator and go out in a
 * single write on `show()`. In immediate mode each pixel is written and
 * drained as it arrives. Either way at most `ledCount` pixels may be sent
 * between two commits.
 */
export class TapeSession {
	public readonly port: string;
	public readonly ledCount: number;
	public readonly buffered: boolean;

	private transport?: TapeTransport;
	private readonly logger: Logger;
	private readonly accumulator: Uint8Array;
	private accumulatedBytes = 0;
	private pixelsSinceShow = 0;

	private constructor(init: TapeSessionInit) {
		this.transport = init.transport;
		this.port = init.port;
		this.ledCount = init.ledCount;
		this.buffered = init.buffered;
		this.logger = init.logger;
		this.accumulator = new Uint8Array(init.buffered ? init.ledCount * BYTES_PER_PIXEL : 0);
	}

	/**
	 * Resolves the port, opens it at the normal baud rate and commits once so
	 * the firmware drops any half-received frame.
	 */
	public static async open(options: TapeSessionOptions = {}): Promise<TapeSession> {
		const logger = options.logger ?? new NoopLogger();
		const ledCount = options.ledCount ?? DEFAULT_LED_COUNT;
		if (!Number.isInteger(ledCount) || ledCount < 1) {
			throw tapeError('INVALID_ARGUMENT', 'open', options.port, undefined, `ledCount must be a positive integer, got ${ledCount}`);
		}

		const port = await resolvePort(options, logger);
		const openTransport = options.openTransport ?? openSerialPortTransport;

		let transport: TapeTransport;
		try {
			transport = await openTransport(port, TAPE_BAUD_RATE.NORMAL);
		} catch (error) {
			logger.error('Tape transport open failed', { port, reason: describeCause(error) });
			throw tapeError('IO_ERROR', 'open', port, error, describeCause(error));
		}

		const session = new TapeSession({
			transport,
			port,
			ledCount,
			buffered: options.buffered ?? DEFAULT_BUFFERED,
			logger
		});

		try {
			await session.show();
		} catch (error) {
			await session.close().catch((closeError: unknown) => {
				logger.warn('Tape transport close after failed open also failed', {
					port,
					reason: describeCause(closeError)
				});
			});
			throw error;
		}

		logger.info('Tape session opened', { port, ledCount, buffered: session.buffered });
		return session;
	}

	public get closed(): boolean {
		return this.transport === undefined;
	}

	/** Pixels sent since the last commit. */
	public get pendingPixels(): number {
		return this.pixelsSinceShow;
	}

	/** Copy of the encoded pixels waiting for `show()`. Always empty in immediate mode. */
	public pendingBytes(): Uint8Array {
		return this.accumulator.slice(0, this.accumulatedBytes);
	}

	/**
	 * Queues (buffered) or writes (immediate) the next pixel. Channels are
	 * clamped to 0..254.
	 */
	public async sendPixel(r: number, g: number, b: number): Promise<void> {
		const transport = this.requireTransport('sendPixel');
		if (this.pixelsSinceShow >= this.ledCount) {
			throw tapeError(
				'CAPACITY_EXCEEDED',
				'sendPixel',
				this.port,
				undefined,
				`${this.ledCount} pixels already sent since the last show()`
			);
		}

		const data = encodePixel(r, g, b);
		if (this.buffered) {
			this.accumulator.set(data, this.accumulatedBytes);
			this.accumulatedBytes += data.length;
			this.pixelsSinceShow += 1;
			return;
		}

		await this.io('sendPixel', () => transport.write(data));
		// Counted once written, even if the drain below fails.
		this.pixelsSinceShow += 1;
		this.logger.trace('Tape pixel written', { port: this.port, pixel: this.pixelsSinceShow, bytes: Array.from(data) });
		await this.io('sendPixel', () => transport.drain());
	}

	/**
	 * Writes a whole frame in one call and commits it. Skips the accumulator
	 * even in buffered mode, so pixels queued earlier are rendered after it.
	 */
	public async sendMany(colors: readonly Pixel[]): Promise<void> {
		const transport = this.requireTransport('sendMany');
		const data = encodePixels(colors);
		await this.io('sendMany', () => transport.write(data));
		await this.show();
	}

	public async show(): Promise<void> {
		const transport = this.requireTransport('show');
		if (this.buffered) {
			const frame = new Uint8Array(this.accumulatedBytes + CONTROL_TRIPLET.length);
			frame.set(this.accumulator.subarray(0, this.accumulatedBytes), 0);
			frame.set(controlTriplet(), this.accumulatedBytes);
			await this.io('show', () => transport.write(frame));
			this.accumulator.fill(0, 0, this.accumulatedBytes);
			this.accumulatedBytes = 0;
		} else {
			await this.io('show', () => transport.write(controlTriplet()));
		}
		this.pixelsSinceShow = 0;

		await this.io('show', async () => {
			await transport.drain();
			// The firmware sends nothing meaningful back.
			await transport.flushInput();
		});
		this.logger.debug('Tape frame shown', { port: this.port });
	}

	/** Fills the whole tape with one color and shows it. */
	public async displayColor(r: number, g: number, b: number): Promise<void> {
		for (let index = 0; index < this.ledCount; index += 1) {
			await this.sendPixel(r, g, b);
		}
		await this.show();
	}

	/**
	 * Signals the firmware to enter its bootloader by reopening at 1200 baud,
	 * then closes the session. The device disconnects afterwards.
	 */
	public async resetToBootloader(): Promise<void> {
		const transport = this.requireTransport('resetToBootloader');
		await this.io('resetToBootloader', () => transport.setBaudRate(TAPE_BAUD_RATE.BOOTLOADER));
		this.logger.info('Tape bootloader reset requested', { port: this.port });
		await this.close();
	}

	public async close(): Promise<void> {
		const transport = this.transport;
		if (!transport) {
			return;
		}

		this.transport = undefined;
		this.accumulatedBytes = 0;
		this.pixelsSinceShow = 0;
		await this.io('close', () => transport.close());
		this.logger.info('Tape session closed', { port: this.port });
	}

	private requireTransport(op: string): TapeTransport {
		if (!this.transport) {
			throw tapeError('CLOSED_SESSION', op, this.port);
		}
		return this.transport;
	}

	private async io(op: string, run: () => Promise<void>): Promise<void> {
		try {
			await run();
		} catch (error) {
			this.logger.warn('Tape transport operation failed', { op, port: this.port, reason: describeCause(error) });
			throw tapeError('IO_ERROR', op, this.port, error, describeCause(error));
		}
	}
}

/**
 * Opens a session, hands it to `run` and closes it afterwards, whether `run`
 * resolves or throws.
 */
export async function withTapeSession<T>(
	options: TapeSessionOptions,
	run: (session: TapeSession) => Promise<T>
): Promise<T> {
	const session = await TapeSession.open(options);
	let result: T;
	try {
		result = await run(session);
	} catch (error) {
		await session.close().catch((closeError: unknown) => {
			options.logger?.warn('Tape session close after failed run also failed', {
				port: session.port,
				reason: describeCause(closeError)
			});
		});
		throw error;
	}

	await session.close();
	return result;
}
