import { describe, it, expect } from 'vitest';
import colorize from './colorized';

describe('colorize', () => {
    it('wraps the text in the color escape', () => {
        expect(colorize('green', '[Web]')).toBe('\x1b[32m[Web]\x1b[0m');
    });

    it('falls back to the default color for unknown names', () => {
        expect(colorize('gray', 'x')).toBe('\x1b[39mx\x1b[0m');
    });

    it('applies several colors from the inside out', () => {
        expect(colorize('Inverted', 'red', 'x')).toBe('\x1b[31m\x1b[7mx\x1b[0m\x1b[0m');
    });
});
