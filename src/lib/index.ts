import * as UTF8 from './utf8/index.js';
import * as Errors from './error.js';
import Log from './log/index.js';
import { LogTargetConsole } from './log/target_console.js';
import { ByteBuffer } from './utils/buffer.js';

export {
	Errors,
	ByteBuffer,
	Log,
	LogTargetConsole,
	UTF8
}
