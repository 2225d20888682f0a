/**
 * @tubeqa/core - Path resolution
 *
 * Resolves TUBEQA_HOME and the location of config.json.
 */

import { join, resolve } from 'node:path';
import { homedir } from 'node:os';

/**
 * Resolve the tubeqa home directory.
 * Priority: TUBEQA_HOME env var > ~/.tubeqa
 */
export function resolveTubeqaHome(env: NodeJS.ProcessEnv = process.env): string {
  const fromEnv = env['TUBEQA_HOME'];
  if (fromEnv) {
    return resolve(fromEnv);
  }
  return join(homedir(), '.tubeqa');
}

/**
 * Resolve the config file path.
 * Priority: TUBEQA_CONFIG env var > TUBEQA_HOME/config.json
 */
export function resolveConfigPath(env: NodeJS.ProcessEnv = process.env): string {
  const fromEnv = env['TUBEQA_CONFIG'];
  if (fromEnv) {
    return resolve(fromEnv);
  }
  return join(resolveTubeqaHome(env), 'config.json');
}
