import { spawn } from 'node:child_process';
import type { ItemAction, ItemActionId } from './types';

export type ActionHandlers = {
  openUrl(url: string): Promise<void>;
  setClipboardText(text: string): Promise<void>;
};

export const ACTION_LABELS: Record<ItemActionId, string> = {
  open: 'Open in Firefox',
  copy: 'Copy URL',
};

export const createItemActions = (url: string): readonly ItemAction[] => {
  const actions: ItemAction[] = [
    { id: 'open', text: ACTION_LABELS.open, url },
    { id: 'copy', text: ACTION_LABELS.copy, url },
  ];
  return Object.freeze(actions);
};

export const runItemAction = async (action: ItemAction, handlers: ActionHandlers): Promise<void> => {
  switch (action.id) {
    case 'open':
      await handlers.openUrl(action.url);
      return;
    case 'copy':
      await handlers.setClipboardText(action.url);
      return;
  }
};

export type Command = {
  readonly command: string;
  readonly args: readonly string[];
};

const runCommand = ({ command, args }: Command, input?: string): Promise<void> =>
  new Promise<void>((resolve, reject) => {
    const child = spawn(command, args, {
      stdio: [input === undefined ? 'ignore' : 'pipe', 'ignore', 'ignore'],
      detached: input === undefined,
    });
    child.once('error', reject);
    child.once('spawn', () => {
      if (input === undefined) {
        child.unref();
        resolve();
        return;
      }
      child.stdin?.end(input);
    });
    if (input !== undefined) {
      child.once('close', (code) => {
        if (code === 0) {
          resolve();
        } else {
          reject(new Error(`${command} exited with code ${code ?? 'null'}`));
        }
      });
    }
  });

export const openCommand = (url: string, platform: NodeJS.Platform): Command => {
  switch (platform) {
    case 'darwin':
      return { command: 'open', args: [url] };
    case 'win32':
      // Not routed through cmd, which would split the URL at `&`.
      return { command: 'rundll32', args: ['url.dll,FileProtocolHandler', url] };
    default:
      return { command: 'xdg-open', args: [url] };
  }
};

const clipboardCommand = (platform: NodeJS.Platform, env: NodeJS.ProcessEnv): Command => {
  switch (platform) {
    case 'darwin':
      return { command: 'pbcopy', args: [] };
    case 'win32':
      return { command: 'clip', args: [] };
    default:
      return env.WAYLAND_DISPLAY
        ? { command: 'wl-copy', args: [] }
        : { command: 'xclip', args: ['-selection', 'clipboard'] };
  }
};

export const createSystemActionHandlers = (
  platform: NodeJS.Platform = process.platform,
  env: NodeJS.ProcessEnv = process.env,
): ActionHandlers => ({
  openUrl: (url) => runCommand(openCommand(url, platform)),
  setClipboardText: (text) => runCommand(clipboardCommand(platform, env), text),
});
