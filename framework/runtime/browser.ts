/**
 * Open a URL in the desktop browser.
 *
 * Best effort only: failures are reported to the callback and otherwise
 * ignored.
 */

import { spawn } from 'node:child_process';

export interface BrowserCommand {
  command: string;
  args: string[];
}

/**
 * Opener command for a platform
 */
export function browserCommand(platform: NodeJS.Platform, url: string): BrowserCommand {
  switch (platform) {
    case 'darwin':
      return { command: 'open', args: [url] };
    case 'win32':
      // `start` treats the first quoted argument as a window title
      return { command: 'cmd', args: ['/c', 'start', '""', url] };
    default:
      return { command: 'xdg-open', args: [url] };
  }
}

/**
 * Spawn the platform opener, detached from this process
 */
export function openInBrowser(
  url: string,
  onError: (error: Error) => void = () => {},
  platform: NodeJS.Platform = process.platform
): void {
  const { command, args } = browserCommand(platform, url);

  try {
    const child = spawn(command, args, { detached: true, stdio: 'ignore' });
    child.on('error', onError);
    child.unref();
  } catch (error) {
    onError(error instanceof Error ? error : new Error(String(error)));
  }
}
