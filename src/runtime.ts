import { createRegistry, loadAlgorithmCatalog } from './algorithms/catalog';
import { AlgorithmRegistry } from './algorithms/registry';
import { probeDuration } from './audio/ffprobe';
import { Env, readEnv } from './config/env';
import { logger, parseLogLevel } from './utils/logger';

export interface Runtime {
  env: Env;
  registry: AlgorithmRegistry;
}

/** Reads the environment, configures logging and registers the available algorithms. */
export async function createRuntime(env: Env = readEnv()): Promise<Runtime> {
  logger.setLevel(parseLogLevel(env.logLevel));
  const catalog = await loadAlgorithmCatalog(env.algorithmsConfig);
  const registry = createRegistry(catalog, {
    defaultTimeoutMs: env.analyzerTimeoutMs,
    probeDuration: (audioPath) => probeDuration(audioPath, env.ffprobePath),
  });
  const names = new Set([...registry.boundaryAlgorithmNames(), ...registry.labelAlgorithmNames()]);
  logger.debug(`Registered algorithms: ${[...names].join(', ')}`);
  return { env, registry };
}
