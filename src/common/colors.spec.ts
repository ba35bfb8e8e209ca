import { validateSync } from 'class-validator';
import { IsQrColor, toHexColor } from './colors';

class Palette {
  @IsQrColor()
  fill!: string;
}

describe('toHexColor', () => {
  it('maps CSS keywords regardless of case', () => {
    expect(toHexColor('red')).toBe('#ff0000');
    expect(toHexColor('White')).toBe('#ffffff');
    expect(toHexColor(' RebeccaPurple ')).toBe('#663399');
  });

  it('expands short hex colors', () => {
    expect(toHexColor('#0aF')).toBe('#00aaff');
  });

  it('keeps long hex colors, lower-cased', () => {
    expect(toHexColor('#FF8800')).toBe('#ff8800');
    expect(toHexColor('#11223344')).toBe('#11223344');
  });

  it('rejects unknown values', () => {
    expect(toHexColor('reddish')).toBeUndefined();
    expect(toHexColor('#12345')).toBeUndefined();
    expect(toHexColor('constructor')).toBeUndefined();
  });
});

describe('IsQrColor', () => {
  it('accepts known colors and reports unknown ones', () => {
    const ok = Object.assign(new Palette(), { fill: 'navy' });
    expect(validateSync(ok)).toHaveLength(0);

    const bad = Object.assign(new Palette(), { fill: 'not-a-color' });
    const errors = validateSync(bad);
    expect(errors).toHaveLength(1);
    expect(errors[0].constraints).toEqual({
      isQrColor: 'fill must be a CSS color name or a hex color',
    });
  });
});
