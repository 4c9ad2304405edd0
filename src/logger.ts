// stdout carries the MCP transport, so every diagnostic goes to stderr.

type Level = 'debug' | 'info' | 'warn' | 'error';

const RANK: Record<Level | 'silent', number> = { debug: 0, info: 1, warn: 2, error: 3, silent: 4 };

function threshold(): number {
  const configured = process.env.POSTURE_LOG_LEVEL?.trim().toLowerCase();
  if (configured === 'debug' || configured === 'info' || configured === 'warn' || configured === 'error' || configured === 'silent') {
    return RANK[configured];
  }
  return RANK.info;
}

function write(level: Level, message: string): void {
  if (RANK[level] < threshold()) return;
  process.stderr.write(`${new Date().toISOString()} [${level}] ${message}\n`);
}

export const logger = {
  debug: (message: string) => write('debug', message),
  info: (message: string) => write('info', message),
  warn: (message: string) => write('warn', message),
  error: (message: string) => write('error', message),
};
