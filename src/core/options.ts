/**
 * Conversion options and their defaults.
 */
import type { ConversionOptions, HeaderSpacing, LinksStyle } from './types.js';

export const DEFAULT_HEADER_SPACING: HeaderSpacing = [true, false, false, false, false, false];

export const DEFAULT_CONVERSION_OPTIONS: ConversionOptions = {
  headerSpacing: DEFAULT_HEADER_SPACING,
  linksStyle: {},
};

/**
 * Merge caller-supplied options over the defaults.
 *
 * `linksStyle` is merged flag by flag, so `{ linksStyle: { bold: true } }`
 * leaves the other two flags inheriting.
 */
export function resolveOptions(options?: Partial<ConversionOptions>): ConversionOptions {
  const linksStyle: LinksStyle = {
    ...DEFAULT_CONVERSION_OPTIONS.linksStyle,
    ...options?.linksStyle,
  };
  return {
    headerSpacing: options?.headerSpacing ?? DEFAULT_CONVERSION_OPTIONS.headerSpacing,
    linksStyle,
  };
}
