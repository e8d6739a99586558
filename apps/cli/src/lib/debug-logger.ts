import os from 'node:os';
import path from 'node:path';
import pino from 'pino';

const debugEnabled = process.env.SKILLPIN_DEBUG === '1' || process.env.SKILLPIN_DEBUG === 'true';
const debugFile = process.env.SKILLPIN_DEBUG_FILE ?? path.join(os.tmpdir(), 'skillpin-debug.log');

// Silent unless SKILLPIN_DEBUG is set; then JSON lines are appended to the debug file.
export const debugLog = pino(
  {
    level: debugEnabled ? 'debug' : 'silent',
    base: { app: 'skillpin-cli', pid: process.pid },
    timestamp: pino.stdTimeFunctions.isoTime,
    formatters: {
      level(label: string) {
        return { level: label };
      },
    },
  },
  pino.destination({ dest: debugEnabled ? debugFile : 2, append: true, mkdir: debugEnabled, sync: true }),
);

export const httpLog = debugLog.child({ module: 'http' });
export const lifecycleLog = debugLog.child({ module: 'lifecycle' });
