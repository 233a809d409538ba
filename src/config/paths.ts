import os from 'node:os';
import path from 'node:path';

export const APP_NAME = 'dockhand';

// $DOCKHAND_CONFIG_PATH > $XDG_CONFIG_HOME/dockhand > ~/.config/dockhand
export function configDir(env: NodeJS.ProcessEnv = process.env): string {
  if (env.DOCKHAND_CONFIG_PATH) return env.DOCKHAND_CONFIG_PATH;
  return path.join(env.XDG_CONFIG_HOME || path.join(os.homedir(), '.config'), APP_NAME);
}

export function settingsPath(env: NodeJS.ProcessEnv = process.env): string {
  return path.join(configDir(env), 'config.yaml');
}

export function groupsPath(env: NodeJS.ProcessEnv = process.env): string {
  return path.join(configDir(env), 'groups.json');
}

export const DEFAULT_DOCKER_HOST = 'unix:///var/run/docker.sock';
