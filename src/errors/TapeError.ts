import { DriverError } from './DriverError';

/**
 * Error codes for LED tape session failures.
 */
export type TapeErrorCode =
	| 'NOT_FOUND'
	| 'IO_ERROR'
	| 'CAPACITY_EXCEEDED'
	| 'CLOSED_SESSION'
	| 'INVALID_ARGUMENT';

/**
 * Unified error class for tape session failures.
 * Callers branch on `code` rather than on subclasses.
 */
export class TapeError extends DriverError<TapeErrorCode> {
	public readonly op: string;
	public readonly port?: string;

	public constructor(options: {
		code: TapeErrorCode;
		message: string;
		op: string;
		port?: string;
		cause?: unknown;
	}) {
		super(options.code, options.message, options.cause);
		this.name = 'TapeError';
		this.op = options.op;
		this.port = options.port;
	}
}

export const TAPE_ERROR_MESSAGES: Record<TapeErrorCode, string> = {
	NOT_FOUND: 'No compatible LED tape was detected. Connect the device or pass a port explicitly.',
	IO_ERROR: 'Serial communication with the LED tape failed. The device may have been disconnected.',
	CAPACITY_EXCEEDED: 'More pixels were sent than the tape holds. Call show() before sending the next frame.',
	CLOSED_SESSION: 'The tape session is closed. Open a new session to keep drawing.',
	INVALID_ARGUMENT: 'An invalid argument was provided to the tape session.'
};

export function isTapeError(error: unknown, code?: TapeErrorCode): error is TapeError {
	return error instanceof TapeError && (code === undefined || error.code === code);
}

export function describeCause(error: unknown): string {
	return error instanceof Error ? error.message : String(error);
}
