import type { Instance as InkInstance } from 'ink';
import { execa } from 'execa';
import { log } from './services/logger';

// Keeps a reference to the current Ink instance and a function to render the App again
let inkInstance: InkInstance | null = null;
let renderApp: (() => InkInstance) | null = null;

export function setInkInstance(instance: InkInstance, renderFn: () => InkInstance) {
  inkInstance = instance;
  renderApp = renderFn;
}

export function unmountInk() {
  inkInstance?.unmount();
  inkInstance = null;
}

/**
 * Hands the terminal to `docker exec -it <id> sh` and takes it back when the
 * shell exits. Ink is unmounted for the duration so nothing draws over it.
 */
export async function runShell(containerId: string, docker = 'docker'): Promise<number | null> {
  const instance = inkInstance;
  instance?.clear();
  instance?.unmount();
  inkInstance = null;
  if (instance) await instance.waitUntilExit();

  try {
    log.info('Shell started', 'shell', { containerId });
    const result = await execa(docker, ['exec', '-it', containerId, 'sh'], { stdio: 'inherit' });
    log.info('Shell exited', 'shell', { containerId, exitCode: result.exitCode });
    return result.exitCode;
  } catch (error) {
    // A non-zero exit is a normal way for a shell to end
    if (typeof error === 'object' && error !== null && 'exitCode' in error && typeof error.exitCode === 'number') {
      log.info('Shell exited', 'shell', { containerId, exitCode: error.exitCode });
      return error.exitCode;
    }
    throw error;
  } finally {
    if (renderApp) inkInstance = renderApp();
  }
}
