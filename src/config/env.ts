import 'dotenv/config';

function numberFromEnv(name: string, fallback: number): number {
  const raw = process.env[name];
  if (raw === undefined || raw === '') {
    return fallback;
  }
  const value = Number(raw);
  if (!Number.isFinite(value)) {
    throw new Error(`${name} must be a number, got "${raw}"`);
  }
  return value;
}

export interface Env {
  workerConcurrency: number;
  algorithmsConfig: string | undefined;
  analyzerTimeoutMs: number;
  ffprobePath: string;
  randomSeed: number;
  logLevel: string;
  redisUrl: string;
  segmentQueue: string;
}

export function readEnv(): Env {
  return {
    workerConcurrency: numberFromEnv('WORKER_CONCURRENCY', 4),
    algorithmsConfig: process.env.ALGORITHMS_CONFIG || undefined,
    analyzerTimeoutMs: numberFromEnv('ANALYZER_TIMEOUT_MS', 120000),
    ffprobePath: process.env.FFPROBE_PATH ?? 'ffprobe',
    randomSeed: numberFromEnv('RANDOM_SEED', 123),
    logLevel: process.env.LOG_LEVEL ?? 'info',
    redisUrl: process.env.REDIS_URL ?? 'redis://localhost:6379',
    segmentQueue: process.env.SEGMENT_QUEUE ?? 'segment-dataset',
  };
}
