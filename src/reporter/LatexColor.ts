import { rgb } from 'd3-color';
import {
    interpolateCividis,
    interpolateInferno,
    interpolateMagma,
    interpolatePlasma,
    interpolateViridis,
} from 'd3-scale-chromatic';
import { InvalidArgumentError } from '../models/Errors';

const COLORMAPS = new Map<string, (t: number) => string>([
    ['viridis', interpolateViridis],
    ['magma', interpolateMagma],
    ['inferno', interpolateInferno],
    ['plasma', interpolatePlasma],
    ['cividis', interpolateCividis],
]);

// Share of the original color kept when lightening a cell background
const COLOR_STRENGTH = 0.3;

export function colormapNames(): string[] {
    return [...COLORMAPS.keys()];
}

export function isKnownColormap(name: string): boolean {
    return COLORMAPS.has(name);
}

function lighten(channel: number): number {
    const value = Math.round(255 - (255 - channel) * COLOR_STRENGTH);
    return Math.max(0, Math.min(255, value));
}

/**
 * Light background color for `t` in [0, 1] as an uppercase RRGGBB string,
 * suitable for `\cellcolor[HTML]{...}` behind black text.
 */
export function colormapLightHex(t: number, colormap: string = 'viridis'): string {
    const interpolate = COLORMAPS.get(colormap);
    if (!interpolate) {
        throw new InvalidArgumentError(`Invalid colormap: ${colormap}. Supported: ${colormapNames().join(', ')}`);
    }
    const clamped = Math.max(0, Math.min(1, t));
    const color = rgb(interpolate(clamped));
    return [color.r, color.g, color.b]
        .map(channel => lighten(channel).toString(16).padStart(2, '0'))
        .join('')
        .toUpperCase();
}

/**
 * Position of `value` between `min` and `max`; 0.5 when the range is empty
 */
export function normalize(value: number, min: number, max: number): number {
    if (max <= min) return 0.5;
    return (value - min) / (max - min);
}
