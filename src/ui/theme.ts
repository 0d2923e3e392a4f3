import chalk from 'chalk';

export const brand = {
  teal: chalk.hex('#14B8A6'),
} as const;

// Text roles, plus one colour per rule kind in the overview.
export const color = {
  secondary: chalk.hex('#A1A1AA'),
  tertiary: chalk.hex('#71717A'),
  success: chalk.hex('#22C55E'),
  error: chalk.hex('#EF4444'),
  warning: chalk.hex('#F59E0B'),
  file: chalk.hex('#0EA5E9'),
  redirect: chalk.hex('#A78BFA'),
  rewrite: chalk.hex('#14B8A6'),
  proxy: chalk.hex('#F472B6'),
  bold: chalk.bold,
} as const;

export const icon = {
  step: '●',
  success: '✓',
  error: '✗',
  warning: '⚠',
  arrow: '→',
} as const;

// ├─ └─ │ for rule and warning lists
export const tree = {
  mid: '├─',
  last: '└─',
  pipe: '│',
} as const;

// Rounded box around the banner
export const box = {
  tl: '╭',
  tr: '╮',
  bl: '╰',
  br: '╯',
  v: '│',
  h: '─',
} as const;
