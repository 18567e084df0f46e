import { spawn } from 'node:child_process';
import { Logger, errorMessage } from '../logger';

export interface BrowserCommand {
  command: string;
  args: string[];
}

export function browserCommand(target: string, platform: NodeJS.Platform = process.platform): BrowserCommand {
  if (platform === 'darwin') {
    return { command: 'open', args: [target] };
  }
  if (platform === 'win32') {
    // The empty string is the window title `start` expects before the target
    return { command: 'cmd', args: ['/c', 'start', '', target] };
  }
  return { command: 'xdg-open', args: [target] };
}

/** Hands the target to the desktop's default browser; failures are only logged. */
export function openInBrowser(target: string, logger: Logger): Promise<boolean> {
  const { command, args } = browserCommand(target);

  return new Promise(resolve => {
    const child = spawn(command, args, { detached: true, stdio: 'ignore' });
    child.once('error', error => {
      logger.warn(`Could not open a browser (${command}): ${errorMessage(error)}`);
      resolve(false);
    });
    child.once('spawn', () => {
      child.unref();
      resolve(true);
    });
  });
}
