import figlet from 'figlet';
import chalk from 'chalk';
import { getPackageVersion } from './version.js';

/**
 * Draws a box around the logo, with centred footer lines under a separator.
 * The logo alone decides the width; longer footer lines are cut.
 */
function boxed(logo: string, footer: string[], padding = 1): string {
  const lines = logo.split('\n').filter(line => line.trim().length > 0);
  const width = Math.max(...lines.map(line => line.length));
  const border = '─'.repeat(width + padding * 2);
  const gap = ' '.repeat(padding);

  const row = (text: string): string => `│${gap}${text.padEnd(width)}${gap}│`;
  const centred = (text: string): string => {
    const clipped = text.slice(0, width);
    return ' '.repeat(Math.floor((width - clipped.length) / 2)) + clipped;
  };

  return [
    `┌${border}┐`,
    ...lines.map(row),
    `├${border}┤`,
    ...footer.map(line => row(centred(line))),
    `└${border}┘`,
  ].join('\n');
}

/**
 * Prints the ANSI Shadow banner to stdout.
 * @param subtitle Optional subtitle to show inside the banner
 */
export function showCompactBanner(subtitle?: string): void {
  const logo = figlet.textSync('INCGRAPH', {
    font: 'ANSI Shadow',
    horizontalLayout: 'fitted',
    verticalLayout: 'fitted',
  });

  const footer = subtitle ? [subtitle] : [];
  footer.push(`v${getPackageVersion()}`);

  console.log(chalk.cyan(boxed(logo.trim(), footer)));
  console.log();
}
