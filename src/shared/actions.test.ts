import { describe, expect, it, vi } from 'vitest';
import { createItemActions, openCommand, runItemAction, type ActionHandlers } from './actions';

const handlers = (): ActionHandlers => ({
  openUrl: vi.fn(async () => {}),
  setClipboardText: vi.fn(async () => {}),
});

describe('item actions', () => {
  it('creates open and copy commands for the URL', () => {
    const actions = createItemActions('https://ex.com');

    expect(actions).toEqual([
      { id: 'open', text: 'Open in Firefox', url: 'https://ex.com' },
      { id: 'copy', text: 'Copy URL', url: 'https://ex.com' },
    ]);
    expect(Object.isFrozen(actions)).toBe(true);
  });

  it('keeps each URL with its own commands', () => {
    const urls = ['https://one.test/', 'https://two.test/'];
    const actions = urls.map((url) => createItemActions(url));

    expect(actions.map(([open]) => open?.url)).toEqual(urls);
  });

  it('dispatches open to the browser and copy to the clipboard', async () => {
    const target = handlers();
    const [open, copy] = createItemActions('https://ex.com');

    if (!open || !copy) {
      throw new Error('expected two actions');
    }
    await runItemAction(open, target);
    await runItemAction(copy, target);

    expect(target.openUrl).toHaveBeenCalledTimes(1);
    expect(target.openUrl).toHaveBeenCalledWith('https://ex.com');
    expect(target.setClipboardText).toHaveBeenCalledTimes(1);
    expect(target.setClipboardText).toHaveBeenCalledWith('https://ex.com');
  });
});

describe('openCommand', () => {
  const url = 'https://search.test/?q=a&b=c';

  it('passes the URL as a single argument on every platform', () => {
    expect(openCommand(url, 'linux')).toEqual({ command: 'xdg-open', args: [url] });
    expect(openCommand(url, 'darwin')).toEqual({ command: 'open', args: [url] });
    expect(openCommand(url, 'win32')).toEqual({ command: 'rundll32', args: ['url.dll,FileProtocolHandler', url] });
  });
});
