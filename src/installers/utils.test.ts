import { colorize, formatBanner } from './utils';

describe('utils.ts', () => {
  const originalIsTTY = process.stdout.isTTY;

  const setTTY = (value: boolean | undefined) => {
    Object.defineProperty(process.stdout, 'isTTY', { value, configurable: true, writable: true });
  };

  afterEach(() => {
    setTTY(originalIsTTY);
  });

  describe('colorize', () => {
    it('should wrap text in ANSI codes on a terminal', () => {
      setTTY(true);
      expect(colorize('RED', 'failed')).toBe('\x1b[0;31mfailed\x1b[0m');
    });

    it('should leave text plain when output is piped', () => {
      setTTY(false);
      expect(colorize('YELLOW', 'warning')).toBe('warning');
    });
  });

  describe('formatBanner', () => {
    it('should box every line to the same width', () => {
      setTTY(false);

      expect(formatBanner(['TuxAgent Installation', 'Linux AI Assistant'], 'GREEN').split('\n')).toEqual([
        `╔${'═'.repeat(39)}╗`,
        `║ TuxAgent Installation${' '.repeat(16)} ║`,
        `║ Linux AI Assistant${' '.repeat(19)} ║`,
        `╚${'═'.repeat(39)}╝`,
      ]);
    });
  });
});
