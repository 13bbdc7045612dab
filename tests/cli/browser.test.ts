import { describe, expect, it } from 'vitest';
import { browserCommand } from '../../src/cli/lib/browser';

describe('browserCommand', () => {
  it('uses the opener of each platform', () => {
    expect(browserCommand('http://127.0.0.1:3000', 'darwin')).toEqual({ command: 'open', args: [ 'http://127.0.0.1:3000' ]});
    expect(browserCommand('http://127.0.0.1:3000', 'win32'))
      .toEqual({ command: 'cmd', args: [ '/c', 'start', '""', 'http://127.0.0.1:3000' ]});
    expect(browserCommand('http://127.0.0.1:3000', 'linux')).toEqual({ command: 'xdg-open', args: [ 'http://127.0.0.1:3000' ]});
  });
});
