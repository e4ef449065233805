// chalk only emits SGR sequences (ESC [ ... m)
const SGR = /\u001b\[[0-9;]*m/g;

export function plainText(text: string): string {
  return text.replace(SGR, '');
}
