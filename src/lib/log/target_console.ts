import type { LogEntry, LogTargetLevel, LogTarget } from './common.js';
import { canLogForTarget } from './common.js';
import { assertNever } from '../utils/never.js';

type ConsoleMethod = 'debug' | 'info' | 'warn' | 'error';

export type LogTargetConsoleConfig = {
	logLevel?: LogTargetLevel;
	filter?: RegExp | null;
	/**
	 * Tag written in front of every line (default "utf8")
	 */
	prefix?: string;
	console?: Pick<typeof console, ConsoleMethod>;
};

function methodForLevel(level: LogEntry['level']): ConsoleMethod {
	switch (level) {
		case 'ERROR':
			return('error');
		case 'WARN':
			return('warn');
		case 'INFO':
			return('info');
		case 'DEBUG':
			return('debug');
		default:
			assertNever(level, 'log level');
	}
}

/**
 * Writes log entries to the console, one line per entry:
 *   [utf8] WARN utf8.decodeAll: Replaced 2 malformed sequence(s) ...
 */
export class LogTargetConsole implements LogTarget {
	readonly logLevel: LogTargetLevel;
	readonly filter: RegExp | null;
	readonly #prefix: string;
	#console: NonNullable<LogTargetConsoleConfig['console']>;

	constructor(config?: LogTargetConsoleConfig) {
		this.logLevel = config?.logLevel ?? 'ALL';
		this.filter = config?.filter ?? null;
		this.#prefix = config?.prefix ?? 'utf8';
		this.#console = config?.console ?? console;
	}

	/**
	 * Write entries to the console right away
	 */
	writeLogs(logs: LogEntry[]): void {
		const tag = `[${this.#prefix}]`;

		for (const log of logs) {
			if (!canLogForTarget(log, this)) {
				continue;
			}

			const method = methodForLevel(log.level);

			this.#console[method](`${tag} ${log.level} ${log.from}:`, ...log.args);
			if (log.trace !== undefined) {
				this.#console[method](`${tag} ${log.level} ${log.from} TRACE:`, log.trace);
			}
		}
	}

	async emitLogs(logs: LogEntry[]): Promise<void> {
		this.writeLogs(logs);
	}
}

export default LogTargetConsole;
