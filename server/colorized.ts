export const colors = {
  Inverted: 7,

  default: 39,
  black: 30,
  red: 31,
  green: 32,
  yellow: 33,
  blue: 34,
  magenta: 35,
  cyan: 36,
  'light gray': 37,
  'dark gray': 90,
  'light red': 91,
  'light green': 92,
  'light yellow': 93,
  'light blue': 94,
  'light magenta': 95,
  'light cyan': 96,
  white: 97,
};

export type ColorName = keyof typeof colors;

function isColorName(name: string): name is ColorName {
  return Object.prototype.hasOwnProperty.call(colors, name);
}

// colorize('green', '[Web]') or colorize('Inverted', 'red', '[Error]'); the last argument is the text
export default function colorize(...parts: string[]): string {
  let text = parts.pop() ?? '';

  parts.forEach((name) => {
    const code = isColorName(name) ? colors[name] : colors['default'];
    text = `\x1b[${code}m${text}\x1b[0m`;
  });
  return text;
}
