import { PlatformDetector } from '../../utils/platform.detector';

describe('PlatformDetector', () => {
  describe('matchesOsType', () => {
    it('should match any platform for any', () => {
      expect(PlatformDetector.matchesOsType('any', 'win32')).toBe(true);
      expect(PlatformDetector.matchesOsType('any', 'linux')).toBe(true);
    });

    it('should treat every non-Windows platform as unix', () => {
      expect(PlatformDetector.matchesOsType('unix', 'linux')).toBe(true);
      expect(PlatformDetector.matchesOsType('unix', 'darwin')).toBe(true);
      expect(PlatformDetector.matchesOsType('unix', 'freebsd')).toBe(true);
      expect(PlatformDetector.matchesOsType('unix', 'win32')).toBe(false);
    });

    it('should match macos and windows exactly', () => {
      expect(PlatformDetector.matchesOsType('macos', 'darwin')).toBe(true);
      expect(PlatformDetector.matchesOsType('macos', 'linux')).toBe(false);
      expect(PlatformDetector.matchesOsType('windows', 'win32')).toBe(true);
      expect(PlatformDetector.matchesOsType('windows', 'darwin')).toBe(false);
    });
  });

  it('should name platforms', () => {
    expect(PlatformDetector.getPlatformName('darwin')).toBe('macOS');
    expect(PlatformDetector.getPlatformName('win32')).toBe('Windows');
    expect(PlatformDetector.getPlatformName('linux')).toBe('Linux');
    expect(PlatformDetector.getPlatformName('aix')).toBe('aix');
    expect(PlatformDetector.isWindows('win32')).toBe(true);
    expect(PlatformDetector.isWindows('linux')).toBe(false);
  });

  it('should detect the current machine', () => {
    const info = PlatformDetector.detect();

    expect(info.platform).toBe(process.platform);
    expect(typeof info.host).toBe('string');
  });
});
