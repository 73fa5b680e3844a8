export class DriverError<TCode extends string = string> extends Error {
	readonly code: TCode;
	readonly cause?: unknown;

	constructor(code: TCode, message: string, cause?: unknown) {
		super(message);
		this.name = 'DriverError';
		this.code = code;
		this.cause = cause;
	}
}
