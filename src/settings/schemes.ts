import { z } from 'zod';

const hexColor = z.string().regex(/^#[0-9a-fA-F]{6}$/, 'expected a #RRGGBB color');

/** The sixteen ANSI roles every Windows Terminal scheme defines. */
export const ANSI_ROLES = [
  'black', 'red', 'green', 'yellow', 'blue', 'purple', 'cyan', 'white',
  'brightBlack', 'brightRed', 'brightGreen', 'brightYellow',
  'brightBlue', 'brightPurple', 'brightCyan', 'brightWhite',
] as const;

export const ColorSchemeSchema = z
  .object({
    name: z.string().min(1),
    background: hexColor.optional(),
    foreground: hexColor.optional(),
    cursorColor: hexColor.optional(),
    selectionBackground: hexColor.optional(),
    black: hexColor,
    red: hexColor,
    green: hexColor,
    yellow: hexColor,
    blue: hexColor,
    purple: hexColor,
    cyan: hexColor,
    white: hexColor,
    brightBlack: hexColor,
    brightRed: hexColor,
    brightGreen: hexColor,
    brightYellow: hexColor,
    brightBlue: hexColor,
    brightPurple: hexColor,
    brightCyan: hexColor,
    brightWhite: hexColor,
  })
  .strict();

export type ColorScheme = z.infer<typeof ColorSchemeSchema>;

export const COOLNIGHT: ColorScheme = {
  name: 'coolnight',
  background: '#010C18',
  foreground: '#ECDEF4',
  cursorColor: '#38FF9C',
  selectionBackground: '#38FF9C',
  black: '#0B3B61',
  red: '#FF3A3A',
  green: '#52FFD0',
  yellow: '#FFF383',
  blue: '#1376F9',
  purple: '#C792EA',
  cyan: '#FF5ED4',
  white: '#16FDA2',
  brightBlack: '#63686D',
  brightRed: '#FF54B0',
  brightGreen: '#74FFD8',
  brightYellow: '#FCF5AE',
  brightBlue: '#388EFF',
  brightPurple: '#AE81FF',
  brightCyan: '#FF6AD7',
  brightWhite: '#60FBBF',
};
