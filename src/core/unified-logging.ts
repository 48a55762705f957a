import { createWriteStream, mkdirSync } from 'node:fs';
import { dirname, join } from 'node:path';
import { homedir } from 'node:os';
import { format } from 'node:util';

type MirrorLevel = 'debug' | 'info' | 'warn' | 'error';
type ConsoleMethod = (...args: unknown[]) => void;

function expandHome(path: string): string {
  if (path.startsWith('~/')) return join(homedir(), path.slice(2));
  return path;
}

function serializeLine(level: MirrorLevel, args: unknown[]): string {
  return `[${new Date().toISOString()}] ${level.toUpperCase()}: ${format(...args)}\n`;
}

export type RunLogMirrorHandle = {
  filePath: string;
  uninstall: () => void;
};

/**
 * Copy every console line of a run (turn banners, planner decisions, API
 * request/response lines) into one append-only file.
 */
export function installRunLogMirror(params: { filePath: string }): RunLogMirrorHandle {
  const filePath = expandHome(params.filePath);
  mkdirSync(dirname(filePath), { recursive: true });
  const stream = createWriteStream(filePath, { flags: 'a' });

  const original: Record<MirrorLevel, ConsoleMethod> = {
    debug: console.debug.bind(console),
    info: console.log.bind(console),
    warn: console.warn.bind(console),
    error: console.error.bind(console),
  };

  const wrap =
    (level: MirrorLevel): ConsoleMethod =>
    (...args: unknown[]) => {
      stream.write(serializeLine(level, args));
      original[level](...args);
    };

  console.debug = wrap('debug');
  console.log = wrap('info');
  console.warn = wrap('warn');
  console.error = wrap('error');

  const onStreamError = (err: Error) => {
    original.error(`run log mirror disabled: ${err.message}`);
    restore();
  };
  stream.on('error', onStreamError);

  let restored = false;
  function restore(): void {
    if (restored) return;
    restored = true;
    console.debug = original.debug;
    console.log = original.info;
    console.warn = original.warn;
    console.error = original.error;
  }

  return {
    filePath,
    uninstall: () => {
      restore();
      stream.off('error', onStreamError);
      stream.end();
    },
  };
}
