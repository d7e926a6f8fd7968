import { ANSI_COLORS } from '../config';

export type BannerColor = keyof Omit<typeof ANSI_COLORS, 'RESET'>;

export function colorize(color: BannerColor, text: string): string {
  if (!process.stdout.isTTY) {
    return text;
  }
  return `${ANSI_COLORS[color]}${text}${ANSI_COLORS.RESET}`;
}

const BANNER_WIDTH = 39;

/**
 * Boxed title used at the start and end of install/uninstall.
 */
export function formatBanner(lines: string[], color: BannerColor): string {
  const border = '═'.repeat(BANNER_WIDTH);
  const body = lines.map(line => colorize(color, `║ ${line.padEnd(BANNER_WIDTH - 2)} ║`));
  return [colorize(color, `╔${border}╗`), ...body, colorize(color, `╚${border}╝`)].join('\n');
}
