import { brand, color, icon, tree } from './theme.js';

/**
 * Top-level step marker: "● Text".
 */
export function step(text: string): string {
  return `${brand.teal(icon.step)} ${color.bold(text)}`;
}

export function substep(text: string): string {
  return `  ${color.tertiary(tree.mid)} ${text}`;
}

export function lastSub(text: string): string {
  return `  ${color.tertiary(tree.last)} ${text}`;
}

/**
 * Pick ├─ or └─ depending on the item's position in a list.
 */
export function treeItem(text: string, index: number, total: number): string {
  return index === total - 1 ? lastSub(text) : substep(text);
}

export function success(text: string): string {
  return color.success(`${icon.success} ${text}`);
}

export function error(text: string): string {
  return color.error(`${icon.error} ${text}`);
}

export function warn(text: string): string {
  return color.warning(`${icon.warning} ${text}`);
}

export function filePath(path: string): string {
  return color.file(path);
}

export function secondary(text: string): string {
  return color.secondary(text);
}

export function tertiary(text: string): string {
  return color.tertiary(text);
}

/**
 * Tree continuation pipe: "  │  text".
 */
export function treeCont(text: string): string {
  return `  ${color.tertiary(tree.pipe)}  ${text}`;
}

/**
 * Shorten paths by replacing $HOME with ~.
 */
export function shortPath(fullPath: string): string {
  const home = process.env.HOME ?? process.env.USERPROFILE ?? '';
  if (home && fullPath.startsWith(home)) {
    return '~' + fullPath.slice(home.length);
  }
  return fullPath;
}

// Strip ANSI escape codes for width calculation.
export function stripAnsi(s: string): string {
  return s.replace(/\x1b\[[0-9;]*m/g, '');
}
