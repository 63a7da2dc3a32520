// Palette helpers extracted for testability

import { Palette, PaletteConfig } from './types';

/** Color used when the active palette is empty */
export const NEUTRAL_COLOR = '#808080';

/** Lightness added to the standard palette to derive the lighter one, in percent */
export const LIGHTER_PERCENT = 30;

export const STANDARD_PALETTE: Palette = [
    '#d7005f',
    '#00875f',
    '#0087d7',
    '#d75f00',
    '#8700af',
    '#5f8700',
    '#af0087',
    '#005faf'
];

export interface Rgb {
    r: number;
    g: number;
    b: number;
}

/**
 * Parses `#rgb` or `#rrggbb`.
 */
export function parseHexColor(color: string): Rgb | null {
    const match = /^#([0-9a-f]{3}|[0-9a-f]{6})$/i.exec(color.trim());
    if (!match) {
        return null;
    }
    let hex = match[1];
    if (hex.length === 3) {
        hex = hex.split('').map(c => c + c).join('');
    }
    return {
        r: parseInt(hex.slice(0, 2), 16),
        g: parseInt(hex.slice(2, 4), 16),
        b: parseInt(hex.slice(4, 6), 16)
    };
}

export function toHexColor({ r, g, b }: Rgb): string {
    return '#' + [r, g, b].map(v => Math.round(v).toString(16).padStart(2, '0')).join('');
}

function hueToChannel(p: number, q: number, t: number): number {
    if (t < 0) { t += 1; }
    if (t > 1) { t -= 1; }
    if (t < 1 / 6) { return p + (q - p) * 6 * t; }
    if (t < 1 / 2) { return q; }
    if (t < 2 / 3) { return p + (q - p) * (2 / 3 - t) * 6; }
    return p;
}

/**
 * Raises the HSL lightness of a hex color by `percent` points, clamped to white.
 * Anything that is not a hex color (named colors, rgba()) is returned unchanged.
 */
export function lighten(color: string, percent: number): string {
    const rgb = parseHexColor(color);
    if (!rgb) {
        return color;
    }

    const r = rgb.r / 255;
    const g = rgb.g / 255;
    const b = rgb.b / 255;
    const max = Math.max(r, g, b);
    const min = Math.min(r, g, b);
    const delta = max - min;
    const l = (max + min) / 2;

    let h = 0;
    let s = 0;
    if (delta !== 0) {
        s = l > 0.5 ? delta / (2 - max - min) : delta / (max + min);
        if (max === r) {
            h = (g - b) / delta + (g < b ? 6 : 0);
        } else if (max === g) {
            h = (b - r) / delta + 2;
        } else {
            h = (r - g) / delta + 4;
        }
        h /= 6;
    }

    const lighter = Math.min(1, Math.max(0, l + percent / 100));
    if (s === 0) {
        const v = lighter * 255;
        return toHexColor({ r: v, g: v, b: v });
    }

    const q = lighter < 0.5 ? lighter * (1 + s) : lighter + s - lighter * s;
    const p = 2 * lighter - q;
    return toHexColor({
        r: hueToChannel(p, q, h + 1 / 3) * 255,
        g: hueToChannel(p, q, h) * 255,
        b: hueToChannel(p, q, h - 1 / 3) * 255
    });
}

export function lightenPalette(palette: Palette, percent: number = LIGHTER_PERCENT): string[] {
    return palette.map(color => lighten(color, percent));
}

/**
 * Gets the active palette for a configuration.
 */
export function getActivePalette(config: PaletteConfig): Palette {
    return config.useLighterPalette ? config.lighterPalette : config.standardPalette;
}

/**
 * Gets the color of a column: columns cycle through the palette.
 */
export function getColumnColor(palette: Palette, column: number): string {
    if (palette.length === 0) {
        return NEUTRAL_COLOR;
    }
    return palette[column % palette.length];
}
