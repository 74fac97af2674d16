export type LogLevel = 'DEBUG' | 'INFO' | 'WARN' | 'ERROR';
export type LogTargetLevel = 'ALL' | LogLevel | 'NONE';

const LOG_TARGET_LEVELS: readonly LogTargetLevel[] = ['ALL', 'DEBUG', 'INFO', 'WARN', 'ERROR', 'NONE'] as const;

const numericLogLevels = {
	DEBUG: 0,
	INFO: 1,
	WARN: 2,
	ERROR: 3
} as const;

export type LogEntry = {
	level: LogLevel;
	from: string;
	args: unknown[];
	trace?: string;
};

export interface LogTarget {
	readonly logLevel: LogTargetLevel;
	/**
	 * When set, only entries whose `from` matches are written
	 */
	readonly filter: RegExp | null;
	emitLogs(logs: LogEntry[]): Promise<void>;
}

export function isLogTargetLevel(input: unknown): input is LogTargetLevel {
	return(LOG_TARGET_LEVELS.some(function(level) {
		return(level === input);
	}));
}

export function canLogForLevel(level: LogLevel, currentLevel: LogLevel): boolean {
	return(numericLogLevels[level] >= numericLogLevels[currentLevel]);
}

export function canLogForTargetLevel(level: LogLevel, targetLevel: LogTargetLevel): boolean {
	if (targetLevel === 'ALL') {
		return(true);
	}

	if (targetLevel === 'NONE') {
		return(false);
	}

	return(canLogForLevel(level, targetLevel));
}

export function canLogForTarget(log: LogEntry, target: Pick<LogTarget, 'logLevel' | 'filter'>): boolean {
	if (target.filter !== null && !target.filter.test(log.from)) {
		return(false);
	}

	return(canLogForTargetLevel(log.level, target.logLevel));
}
