import type { LoggerMethods } from '@quillkit/logger';

import { spawnAsync } from '@quillkit/shared';

/**
 * Opens a finished artifact for the user
 */
export interface ArtifactOpener {
  /**
   * Resolves false when the artifact could not be opened
   */
  open(path: string): Promise<boolean>;
}

export interface OpenCommand {
  command: string;
  args: string[];
}

/**
 * Command that opens `path` in the platform's default application, or
 * undefined on platforms without one
 */
export function resolveOpenCommand(
  platform: NodeJS.Platform,
  path: string,
): OpenCommand | undefined {
  switch (platform) {
    case 'darwin':
      return { command: 'open', args: [path] };
    case 'win32':
      // `start` treats the first quoted argument as the window title
      return { command: 'cmd', args: ['/c', 'start', '""', path] };
    case 'linux':
    case 'freebsd':
    case 'openbsd':
      return { command: 'xdg-open', args: [path] };
    default:
      return undefined;
  }
}

/**
 * Opens artifacts with the operating system's default viewer.
 *
 * The viewer is started detached and not waited for.
 */
export class SystemArtifactOpener implements ArtifactOpener {
  constructor(
    private readonly logger: LoggerMethods,
    private readonly platform: NodeJS.Platform = process.platform,
  ) {}

  async open(path: string): Promise<boolean> {
    const openCommand = resolveOpenCommand(this.platform, path);
    if (!openCommand) {
      this.logger.warn(
        `[SystemArtifactOpener] No default opener for platform ${this.platform}`,
      );
      return false;
    }

    await spawnAsync(openCommand.command, openCommand.args, {
      detached: true,
      stdio: 'ignore',
      waitForExit: false,
    });

    this.logger.debug(
      `[SystemArtifactOpener] Launched ${openCommand.command} for ${path}`,
    );
    return true;
  }
}
