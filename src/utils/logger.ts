// src/utils/logger.ts
import * as fs from 'fs';
import * as path from 'path';
import winston, { Logform } from 'winston';
import Transport from 'winston-transport';
import { LogLevel } from '../types';

const LOG_DIR = path.join(process.cwd(), 'results', 'logs');
const ALL_LOG_FILE = path.join(LOG_DIR, 'bisection.all.log');
const ERROR_LOG_FILE = path.join(LOG_DIR, 'bisection.error.log');

// Jest 実行時はファイルにもコンソールにも書き出さない
const isTestRun = process.env.NODE_ENV === 'test';

if (!isTestRun) {
	try {
		if (!fs.existsSync(LOG_DIR)) {
			fs.mkdirSync(LOG_DIR, { recursive: true });
		}
	} catch (e) {
		console.error(`Error creating log directory ${LOG_DIR}:`, e);
	}
}

// --- カスタムレベルと色の定義 ---
const customLevels = {
	levels: {
		error: 0,
		warn: 1,
		success: 2,
		info: 3,
		debug: 4,
	},
	colors: {
		error: 'red',
		warn: 'yellow',
		success: 'green',
		info: 'magenta',
		debug: 'cyan',
	},
};

winston.addColors(customLevels.colors);

let currentLogLevel: LogLevel = 'info';

const fileLogFormat = winston.format.combine(
	winston.format.timestamp({ format: 'YYYY-MM-DDTHH:mm:ss.SSSZ' }),
	winston.format.errors({ stack: true }),
	winston.format.splat(),
	winston.format.printf((info: Logform.TransformableInfo) => {
		const stackInfo = info.stack ? `\n${String(info.stack)}` : '';
		const level = info.level.toUpperCase().padEnd(7);
		return `[${String(info.timestamp)}] [${level}] - ${String(info.message)}${stackInfo}`;
	})
);

const MAX_LEVEL_LENGTH = 7; // "SUCCESS"
const levelAlign = winston.format((info) => {
	const level = info.level.toUpperCase();
	const padding = MAX_LEVEL_LENGTH - level.length;
	if (padding > 0) {
		const padStart = Math.floor(padding / 2);
		const padEnd = padding - padStart;
		info.level = ' '.repeat(padStart) + level + ' '.repeat(padEnd);
	} else {
		info.level = level;
	}
	return info;
});

const consoleLogFormat = winston.format.combine(
	winston.format.timestamp({ format: 'HH:mm:ss' }),
	levelAlign(),
	winston.format.colorize(),
	winston.format.printf((info: Logform.TransformableInfo) => {
		return `[${String(info.timestamp)}] [${info.level}] - ${String(info.message)}`;
	})
);

// 終了時サマリー用に警告とエラーだけを保持する
const memoryTransportBuffer: Logform.TransformableInfo[] = [];
class MemoryTransport extends Transport {
	log(info: Logform.TransformableInfo, callback: () => void) {
		setImmediate(() => { this.emit('logged', info); });
		if (info.level === 'error' || info.level === 'warn') {
			memoryTransportBuffer.push(info);
		}
		callback();
	}
}

function createTransports(): Transport[] {
	if (isTestRun) {
		return [new winston.transports.Console({ silent: true })];
	}
	return [
		new winston.transports.File({
			filename: ALL_LOG_FILE,
			level: 'debug',
			options: { flags: 'w' },
		}),
		new winston.transports.File({
			filename: ERROR_LOG_FILE,
			level: 'warn',
			options: { flags: 'w' },
		}),
		// コンソールは 'success' 以上のみ。計測結果の行もここに出る
		new winston.transports.Console({
			format: consoleLogFormat,
			level: 'success',
			stderrLevels: ['error', 'warn', 'success', 'info', 'debug'],
		}),
		new MemoryTransport({ level: 'warn' }),
	];
}

const logger = winston.createLogger({
	level: currentLogLevel,
	levels: customLevels.levels,
	format: fileLogFormat,
	transports: createTransports(),
	exitOnError: false,
});

export function isLogLevel(value: string): value is LogLevel {
	return Object.prototype.hasOwnProperty.call(customLevels.levels, value);
}

const setLogLevel = (newLevel: LogLevel): void => {
	currentLogLevel = newLevel;
	logger.level = currentLogLevel;

	// コンソールは 'success' より詳細にはしない
	const consoleTransport = logger.transports.find(t => t instanceof winston.transports.Console);
	if (consoleTransport && !isTestRun) {
		consoleTransport.level = customLevels.levels[newLevel] < customLevels.levels.success
			? newLevel
			: 'success';
	}

	logger.info(`File log level set to "${currentLogLevel}" (console shows "${consoleTransport?.level ?? 'success'}" and above).`);
};

const flushErrorLogs = async (): Promise<void> => {
	if (isTestRun) return;
	if (memoryTransportBuffer.length > 0) {
		console.error(`\n--- Errors / warnings (${memoryTransportBuffer.length}) ---`);
		memoryTransportBuffer.forEach(info => {
			const stack = info.stack ? `\n${String(info.stack)}` : '';
			console.error(`[${info.level.toUpperCase()}] ${String(info.message)}${stack}`);
		});
	} else {
		console.error(`\nNo errors or warnings were recorded.`);
	}
	console.error(`--- Full log: ${ALL_LOG_FILE} ---`);
};

const log = {
	error: (message: string, error?: unknown) => {
		if (error instanceof Error) {
			logger.error(message, { stack: error.stack });
		} else if (error !== undefined) {
			logger.error(`${message} ${String(error)}`);
		} else {
			logger.error(message);
		}
	},
	warn: (message: string, ...meta: unknown[]) => logger.warn(message, ...meta),
	success: (message: string, ...meta: unknown[]) => logger.log('success', message, ...meta),
	info: (message: string, ...meta: unknown[]) => logger.info(message, ...meta),
	debug: (message: string, ...meta: unknown[]) => logger.debug(message, ...meta),
	step: (message: string) => logger.log('success', `--- ${message} ---`),
	setLogLevel,
	flushErrorLogs,
};

export { log };
