import { lib } from '@keetanetwork/keetanet-client';
import type { LogEntry, LogLevel, LogTargetLevel } from './common.js';
import { LogTargetConsole } from './target_console.js';
import type { LogTargetConsoleConfig } from './target_console.js';
export type * from '@keetanetwork/keetanet-client/lib/log/index.js';

const Log: typeof lib.Log = lib.Log;

/**
 * Logger that writes every entry to its console target as it is logged;
 * unlike `Log` there is no queue and nothing to sync
 */
class ConsoleLog {
	readonly target: LogTargetConsole;

	constructor(target: LogTargetConsole) {
		this.target = target;
	}

	#write(level: LogLevel, from: string, args: unknown[]): void {
		const entry: LogEntry = { level, from, args };
		this.target.writeLogs([entry]);
	}

	log(from: string, ...args: unknown[]): void {
		this.#write('INFO', from, args);
	}

	debug(from: string, ...args: unknown[]): void {
		this.#write('DEBUG', from, args);
	}

	info(from: string, ...args: unknown[]): void {
		this.#write('INFO', from, args);
	}

	warn(from: string, ...args: unknown[]): void {
		this.#write('WARN', from, args);
	}

	error(from: string, ...args: unknown[]): void {
		this.#write('ERROR', from, args);
	}
}

/**
 * A logger writing to the console, filtered at `logLevel`
 */
function createConsoleLog(logLevel: LogTargetLevel = 'WARN', config: Omit<LogTargetConsoleConfig, 'logLevel'> = {}): ConsoleLog {
	return(new ConsoleLog(new LogTargetConsole({ ...config, logLevel })));
}

export {
	Log,
	ConsoleLog,
	createConsoleLog
};
export default Log;
