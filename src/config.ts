export interface ScannerConfig {
  region: string;
  maxAttempts: number;
  privilegedUser: string;
  privilegedEventLimit: number;
  concurrency: number;
}

const MAX_PRIVILEGED_EVENTS = 10;
const MAX_CONCURRENCY = 6;

function readInt(name: string, fallback: number): number {
  const raw = process.env[name];
  if (!raw) return fallback;
  const parsed = Number(raw);
  return Number.isInteger(parsed) ? parsed : fallback;
}

function clamp(value: number, min: number, max: number): number {
  return Math.min(Math.max(value, min), max);
}

function readRegion(): string {
  const region = process.env.AWS_REGION?.trim() || process.env.AWS_DEFAULT_REGION?.trim();
  return region || 'us-east-1';
}

export function loadConfig(): ScannerConfig {
  return {
    region: readRegion(),
    maxAttempts: clamp(readInt('POSTURE_MAX_ATTEMPTS', 3), 1, 10),
    privilegedUser: process.env.POSTURE_PRIVILEGED_USER?.trim() || 'root',
    privilegedEventLimit: clamp(readInt('POSTURE_ROOT_EVENT_LIMIT', MAX_PRIVILEGED_EVENTS), 1, MAX_PRIVILEGED_EVENTS),
    concurrency: clamp(readInt('POSTURE_CONCURRENCY', 1), 1, MAX_CONCURRENCY),
  };
}
