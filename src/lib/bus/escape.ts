export const UNIT_PATH_PREFIX = '/org/freedesktop/systemd1/unit/';

/** Decodes systemd's object-path label escaping: `_xx` is one hex byte, `_` alone is the empty string. */
export function unescapeBusLabel(label: string): string {
  if (label === '_') return '';
  const bytes: number[] = [];
  for (let i = 0; i < label.length; i += 1) {
    const hex = label.slice(i + 1, i + 3);
    if (label[i] === '_' && /^[0-9a-fA-F]{2}$/.test(hex)) {
      bytes.push(parseInt(hex, 16));
      i += 2;
    } else {
      bytes.push(label.charCodeAt(i));
    }
  }
  return Buffer.from(bytes).toString('utf-8');
}

export function unitNameFromPath(objectPath: string): string | null {
  if (!objectPath.startsWith(UNIT_PATH_PREFIX)) return null;
  const label = objectPath.slice(UNIT_PATH_PREFIX.length);
  if (label === '' || label.includes('/')) return null;
  return unescapeBusLabel(label);
}
