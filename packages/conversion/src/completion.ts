/**
 * Completion Hooks
 * 
 * Side effects fired after a successful conversion: reveal the file,
 * play a sound, post a notification. All of them are best effort; the
 * session outcome never depends on them.
 */

import { dirname } from 'node:path';
import { executeCommand, type CommandRunner } from '@mediaconv/utils';

export interface CompletionNotification {
  title: string;
  body: string;
}

export interface CompletionHooks {
  revealFile(path: string): void | Promise<void>;
  playSound(): void | Promise<void>;
  postNotification(notification: CompletionNotification): void | Promise<void>;
}

export const noopCompletionHooks: CompletionHooks = {
  revealFile: () => {},
  playSound: () => {},
  postNotification: () => {},
};

export interface DesktopHooksOptions {
  platform?: NodeJS.Platform;
  runCommand?: CommandRunner;
  /** System sound name (macOS) */
  soundName?: string;
}

const HOOK_TIMEOUT_MS = 10000;

/**
 * Escape a value for an AppleScript string literal
 */
function appleScriptString(value: string): string {
  return `"${value.replace(/\\/g, '\\\\').replace(/"/g, '\\"')}"`;
}

/**
 * Hooks backed by the platform's own desktop commands
 */
export function createDesktopHooks(options: DesktopHooksOptions = {}): CompletionHooks {
  const platform = options.platform ?? process.platform;
  const runCommand = options.runCommand ?? executeCommand;
  const soundName = options.soundName ?? 'Glass';

  const run = async (command: string, args: string[]): Promise<void> => {
    const result = await runCommand(command, args, { timeout: HOOK_TIMEOUT_MS });
    if (result.exitCode !== 0) {
      throw new Error(`${command} exited with code ${result.exitCode}`);
    }
  };

  switch (platform) {
    case 'darwin':
      return {
        revealFile: path => run('open', ['-R', path]),
        playSound: () => run('afplay', [`/System/Library/Sounds/${soundName}.aiff`]),
        postNotification: ({ title, body }) => run('osascript', [
          '-e',
          `display notification ${appleScriptString(body)} with title ${appleScriptString(title)}`,
        ]),
      };

    case 'win32':
      return {
        revealFile: path => run('explorer', [`/select,${path}`]),
        playSound: () => {},
        postNotification: () => {},
      };

    default:
      return {
        revealFile: path => run('xdg-open', [dirname(path)]),
        playSound: () => run('canberra-gtk-play', ['-i', 'complete']),
        postNotification: ({ title, body }) => run('notify-send', [title, body]),
      };
  }
}
