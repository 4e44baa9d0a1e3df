import { describe, expect, it } from 'vitest';
import { formatColor, isEmptyStyle, parseColor, parseHexColor } from './style.js';

describe('parseHexColor', () => {
  it('parses #RRGGBB literals', () => {
    expect(parseHexColor('#ff8000')).toEqual({ kind: 'rgb', r: 255, g: 128, b: 0 });
    expect(parseHexColor('#A0b0C0')).toEqual({ kind: 'rgb', r: 160, g: 176, b: 192 });
  });

  it('rejects anything else', () => {
    expect(parseHexColor('')).toBeUndefined();
    expect(parseHexColor('#fff')).toBeUndefined();
    expect(parseHexColor('ff8000')).toBeUndefined();
    expect(parseHexColor('#ff80001')).toBeUndefined();
    expect(parseHexColor('#gg0000')).toBeUndefined();
  });
});

describe('parseColor', () => {
  it('prefers palette entries over names', () => {
    const palette = new Map([['red', { kind: 'rgb', r: 1, g: 2, b: 3 } as const]]);

    expect(parseColor('red', palette)).toEqual({ kind: 'rgb', r: 1, g: 2, b: 3 });
    expect(parseColor('red')).toEqual({ kind: 'named', name: 'red' });
  });

  it('accepts reset, ANSI names and hex', () => {
    expect(parseColor('reset')).toEqual({ kind: 'reset' });
    expect(parseColor('light-blue')).toEqual({ kind: 'named', name: 'light-blue' });
    expect(parseColor('#000001')).toEqual({ kind: 'rgb', r: 0, g: 0, b: 1 });
    expect(parseColor('chartreuse')).toBeUndefined();
  });
});

describe('formatColor', () => {
  it('renders each color kind', () => {
    expect(formatColor({ kind: 'rgb', r: 255, g: 0, b: 10 })).toBe('#ff000a');
    expect(formatColor({ kind: 'named', name: 'cyan' })).toBe('cyan');
    expect(formatColor({ kind: 'reset' })).toBe('reset');
  });
});

describe('isEmptyStyle', () => {
  it('is true only without colors and modifiers', () => {
    expect(isEmptyStyle({})).toBe(true);
    expect(isEmptyStyle({ modifiers: [] })).toBe(true);
    expect(isEmptyStyle({ fg: { kind: 'reset' } })).toBe(false);
    expect(isEmptyStyle({ modifiers: ['bold'] })).toBe(false);
  });
});
