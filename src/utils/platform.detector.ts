import * as os from 'os';
import { OsType } from '../types/config.types';

/**
 * Facts about the machine a command runs on
 */
export interface PlatformInfo {
  platform: NodeJS.Platform;
  user: string | undefined;
  host: string;
}

/**
 * Platform detection helpers
 */
export class PlatformDetector {
  /**
   * Human readable platform name
   */
  public static getPlatformName(platform: NodeJS.Platform = process.platform): string {
    switch (platform) {
      case 'darwin':
        return 'macOS';
      case 'win32':
        return 'Windows';
      case 'linux':
        return 'Linux';
      default:
        return platform;
    }
  }

  public static isWindows(platform: NodeJS.Platform = process.platform): boolean {
    return platform === 'win32';
  }

  /**
   * Whether a bootstrap `os` constraint admits `platform`.
   * `unix` covers every non-Windows platform, macOS included.
   */
  public static matchesOsType(osType: OsType, platform: NodeJS.Platform = process.platform): boolean {
    switch (osType) {
      case 'any':
        return true;
      case 'windows':
        return platform === 'win32';
      case 'macos':
        return platform === 'darwin';
      case 'unix':
        return platform !== 'win32';
    }
  }

  /**
   * Current platform, user and host name
   */
  public static detect(): PlatformInfo {
    return {
      platform: process.platform,
      user: PlatformDetector.currentUser(),
      host: os.hostname(),
    };
  }

  private static currentUser(): string | undefined {
    try {
      return os.userInfo().username;
    } catch {
      return process.env['USER'] ?? process.env['USERNAME'];
    }
  }
}
