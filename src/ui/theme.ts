/**
 * UI Theme - colors, icons and layout helpers for terminal output
 */

import chalk from 'chalk';
import figures from 'figures';

export function isPlainMode(): boolean {
    const ui = process.env.UI_MODE?.trim().toLowerCase();
    return ui === 'plain' || process.env.NO_COLOR !== undefined;
}

function maybeColor(styler: (text: string) => string): (text: string) => string {
    return (text: string) => (isPlainMode() ? text : styler(text));
}

export function getBoxOuterWidth(maxWidth: number = 100): number {
    const columns = process.stdout.columns;
    if (typeof columns !== 'number' || columns <= 0) return maxWidth;
    // Keep a small margin to avoid terminal soft-wrapping at the right edge.
    return Math.min(maxWidth, Math.max(0, columns - 2));
}

// Color palette
export const colors = {
    primary: maybeColor(chalk.hex('#0E7490')),      // Teal (accent)
    secondary: maybeColor(chalk.hex('#38BDF8')),    // Sky (secondary accent)
    success: maybeColor(chalk.hex('#10B981')),      // Green
    warning: maybeColor(chalk.hex('#F59E0B')),      // Amber
    error: maybeColor(chalk.hex('#EF4444')),        // Red
    muted: maybeColor(chalk.gray),
    dim: maybeColor(chalk.dim),
    bold: maybeColor(chalk.bold),
};

export const gradients = {
    title: (text: string) => (isPlainMode() ? text : chalk.bold(colors.primary(text))),
    success: (text: string) => (isPlainMode() ? text : chalk.bold(colors.success(text))),
    error: (text: string) => (isPlainMode() ? text : chalk.bold(colors.error(text))),
};

// Status/icons (use `figures` for OS-safe fallbacks)
export const icons = {
    complete: figures.tick,
    error: figures.cross,
    warning: figures.warning,
    info: figures.info,
    arrow: figures.arrowRight,
    bullet: figures.bullet,
    search: figures.pointerSmall,
    user: figures.pointer,
    assistant: figures.star,
};

export function divider(maxWidth: number = 60): string {
    const columns = process.stdout.columns;
    const width = typeof columns === 'number' && columns > 0 ? Math.min(columns, maxWidth) : maxWidth;
    return '─'.repeat(Math.max(0, width));
}

/**
 * Title with an optional muted subtitle on the same line
 */
export function createHeader(title: string, subtitle?: string): string {
    const parts = [gradients.title(title)];
    if (subtitle) parts.push(colors.muted(subtitle));
    return parts.join(' ');
}

export function sectionHeader(title: string): string {
    return `\n${colors.primary(title)}\n`;
}

/**
 * Truncate to `width` characters, marking the cut with an ellipsis
 */
export function truncate(text: string, width: number): string {
    const singleLine = text.replace(/\s+/g, ' ').trim();
    if (singleLine.length <= width) return singleLine;
    return `${singleLine.slice(0, Math.max(0, width - 1))}${figures.ellipsis}`;
}
