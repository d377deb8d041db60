import type { LoggerMethods } from '@quillkit/logger';

import { spawnAsync } from '@quillkit/shared';
import { beforeEach, describe, expect, test, vi } from 'vitest';

import { SystemArtifactOpener, resolveOpenCommand } from './artifact-opener';

vi.mock('@quillkit/shared', () => ({
  spawnAsync: vi.fn(),
}));

describe('resolveOpenCommand', () => {
  test('uses open on macOS', () => {
    expect(resolveOpenCommand('darwin', '/tmp/a.pdf')).toEqual({
      command: 'open',
      args: ['/tmp/a.pdf'],
    });
  });

  test('uses cmd start with an empty title on Windows', () => {
    expect(resolveOpenCommand('win32', 'C:\\out\\a.docx')).toEqual({
      command: 'cmd',
      args: ['/c', 'start', '""', 'C:\\out\\a.docx'],
    });
  });

  test.each(['linux', 'freebsd', 'openbsd'] as const)(
    'uses xdg-open on %s',
    (platform) => {
      expect(resolveOpenCommand(platform, '/tmp/a.pdf')).toEqual({
        command: 'xdg-open',
        args: ['/tmp/a.pdf'],
      });
    },
  );

  test('returns undefined elsewhere', () => {
    expect(resolveOpenCommand('aix', '/tmp/a.pdf')).toBeUndefined();
  });
});

describe('SystemArtifactOpener', () => {
  let mockLogger: LoggerMethods;

  beforeEach(() => {
    mockLogger = {
      info: vi.fn(),
      warn: vi.fn(),
      error: vi.fn(),
      debug: vi.fn(),
    };
  });

  test('launches the viewer detached without waiting for it', async () => {
    vi.mocked(spawnAsync).mockResolvedValue({
      stdout: '',
      stderr: '',
      code: null,
    });
    const opener = new SystemArtifactOpener(mockLogger, 'linux');

    await expect(opener.open('/tmp/report.pdf')).resolves.toBe(true);
    expect(spawnAsync).toHaveBeenCalledWith('xdg-open', ['/tmp/report.pdf'], {
      detached: true,
      stdio: 'ignore',
      waitForExit: false,
    });
  });

  test('returns false on a platform without an opener', async () => {
    const opener = new SystemArtifactOpener(mockLogger, 'aix');

    await expect(opener.open('/tmp/report.pdf')).resolves.toBe(false);
    expect(spawnAsync).not.toHaveBeenCalled();
    expect(mockLogger.warn).toHaveBeenCalledWith(
      '[SystemArtifactOpener] No default opener for platform aix',
    );
  });

  test('propagates spawn errors', async () => {
    vi.mocked(spawnAsync).mockRejectedValue(new Error('spawn xdg-open ENOENT'));
    const opener = new SystemArtifactOpener(mockLogger, 'linux');

    await expect(opener.open('/tmp/report.pdf')).rejects.toThrow(
      'spawn xdg-open ENOENT',
    );
  });
});
