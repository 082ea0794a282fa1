import { homedir } from 'node:os';
import { join } from 'node:path';

const APP_DIR = '.imsg-relay';

/**
 * Resolves the data root directory.
 * Default: ~/.imsg-relay/
 * Override via IMSG_RELAY_DATA_DIR env var.
 */
export function getDataRoot(): string {
  const override = process.env.IMSG_RELAY_DATA_DIR;
  if (override) return override;

  return join(homedir(), APP_DIR);
}

export interface DataPaths {
  root: string;
  runtimeConfigFile: string;
  cursorFile: string;
  historyDir: string;
  callLogDir: string;
}

export function resolveDataPaths(root: string = getDataRoot()): DataPaths {
  return {
    root,
    runtimeConfigFile: join(root, 'runtime-config.json'),
    cursorFile: join(root, 'cursors.json'),
    historyDir: join(root, 'history'),
    callLogDir: join(root, 'calls'),
  };
}
