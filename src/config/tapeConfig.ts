import * as fs from 'node:fs';
import * as path from 'node:path';
import { LOG_LEVELS } from '../diagnostics/logger';
import type { Logger, LogLevel } from '../diagnostics/logger';
import { DEFAULT_BUFFERED, DEFAULT_LED_COUNT } from '../device/tapeSession';
import type { TapeSessionOptions } from '../device/tapeSession';
import { sanitizeBoolean, sanitizeEnum, sanitizeNumber, sanitizeOptionalString } from './sanitizers';

const RELATIVE_TAPE_CONFIG_PATH = path.join('config', 'tape.json');

const MIN_LED_COUNT = 1;
const DEFAULT_LOG_LEVEL: LogLevel = 'info';

interface TapeConfigJson {
	port?: unknown;
	ledCount?: unknown;
	buffered?: unknown;
	logLevel?: unknown;
}

export interface TapeConfigSnapshot {
	/** Absent means auto-discovery. */
	port?: string;
	ledCount: number;
	buffered: boolean;
	logLevel: LogLevel;
}

export function normalizeTapeConfig(raw: TapeConfigJson): TapeConfigSnapshot {
	return {
		port: sanitizeOptionalString(raw.port),
		ledCount: sanitizeNumber(raw.ledCount, DEFAULT_LED_COUNT, MIN_LED_COUNT),
		buffered: sanitizeBoolean(raw.buffered, DEFAULT_BUFFERED),
		logLevel: sanitizeEnum(raw.logLevel, LOG_LEVELS, DEFAULT_LOG_LEVEL)
	};
}

function isConfigObject(value: unknown): value is TapeConfigJson {
	return typeof value === 'object' && value !== null && !Array.isArray(value);
}

export function readTapeConfig(rootPath: string, logger?: Logger): TapeConfigSnapshot {
	const configPath = path.join(rootPath, RELATIVE_TAPE_CONFIG_PATH);
	try {
		const rawText = fs.readFileSync(configPath, 'utf8');
		const parsed: unknown = JSON.parse(rawText);
		if (!isConfigObject(parsed)) {
			throw new Error('JSON root must be an object.');
		}
		return normalizeTapeConfig(parsed);
	} catch (error) {
		const reason = error instanceof Error ? error.message : String(error);
		logger?.warn('Tape config fallback to defaults.', {
			configPath,
			reason
		});
		return normalizeTapeConfig({});
	}
}

export function toSessionOptions(config: TapeConfigSnapshot, logger?: Logger): TapeSessionOptions {
	return {
		port: config.port,
		ledCount: config.ledCount,
		buffered: config.buffered,
		logger
	};
}
