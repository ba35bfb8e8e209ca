import { ValidationOptions, registerDecorator } from 'class-validator';
import cssColors from './data/css-colors.json';

const NAMED_COLORS: Readonly<Record<string, string>> = cssColors;

const SHORT_HEX = /^#([0-9a-f])([0-9a-f])([0-9a-f])$/i;
const LONG_HEX = /^#(?:[0-9a-f]{6}|[0-9a-f]{8})$/i;

/**
 * Converts a CSS color keyword or hex string into the `#rrggbb[aa]` form the
 * PNG renderer expects. Returns `undefined` for anything it does not know.
 */
export function toHexColor(value: string): string | undefined {
  const color = value.trim().toLowerCase();

  if (Object.prototype.hasOwnProperty.call(NAMED_COLORS, color)) {
    return NAMED_COLORS[color];
  }

  const short = SHORT_HEX.exec(color);
  if (short) {
    return `#${short[1]}${short[1]}${short[2]}${short[2]}${short[3]}${short[3]}`;
  }

  return LONG_HEX.test(color) ? color : undefined;
}

export function IsQrColor(validationOptions?: ValidationOptions) {
  return (object: object, propertyName: string) => {
    registerDecorator({
      name: 'isQrColor',
      target: object.constructor,
      propertyName,
      options: {
        message: `${propertyName} must be a CSS color name or a hex color`,
        ...validationOptions,
      },
      validator: {
        validate: (value: unknown) =>
          typeof value === 'string' && toHexColor(value) !== undefined,
      },
    });
  };
}
