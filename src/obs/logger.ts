import winston from 'winston';

export const LOG_LEVELS = ['debug', 'info', 'warn', 'error'] as const;

export type LogLevel = (typeof LOG_LEVELS)[number];

export function isLogLevel(value: unknown): value is LogLevel {
	return LOG_LEVELS.some((level) => level === value);
}

// Parsed values can be large; keep log lines short.
const truncateFormat = winston.format((info) => {
	for (const k of Object.keys(info)) {
		const v = info[k];
		if (typeof v === 'string' && v.length > 500) {
			info[k] = `${v.slice(0, 500)}…`;
		}
	}
	return info;
});

function envLevel(): LogLevel {
	const fromEnv = process.env.NESTARGS_LOG_LEVEL ?? process.env.LOG_LEVEL;
	return isLogLevel(fromEnv) ? fromEnv : 'warn';
}

let currentLevel: LogLevel = envLevel();
let baseLogger: winston.Logger | null = null;

function buildLogger(level: LogLevel): winston.Logger {
	return winston.createLogger({
		level,
		levels: winston.config.npm.levels, // debug/info/warn/error
		format: winston.format.combine(
			truncateFormat(),
			winston.format.timestamp(),
			winston.format.json()
		),
		transports: [
			// stdout is reserved for command output
			new winston.transports.Console({
				stderrLevels: [...LOG_LEVELS],
			}),
		],
	});
}

// Children share the base logger's level, so module-level children follow it.
export function setLogLevel(level: LogLevel) {
	currentLevel = level;
	if (baseLogger) {
		baseLogger.level = level;
	} else {
		baseLogger = buildLogger(level);
	}
}

export function getLogLevel(): LogLevel {
	return currentLevel;
}

export function getLogger(): winston.Logger {
	if (!baseLogger) {
		baseLogger = buildLogger(currentLevel);
	}
	return baseLogger;
}

export function childLogger(
	bindings: Record<string, unknown> = {}
): winston.Logger {
	return getLogger().child(bindings);
}
