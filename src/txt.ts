const MAX_TXT_STRING = 255;

/** Wrap a TXT value in double quotes unless it already is */
export function quoteTxt(value: string): string {
  if (value.length >= 2 && value.startsWith('"') && value.endsWith('"')) {
    return value;
  }
  return `"${value}"`;
}

/** Escape one character for a zone-file string; bytes outside printable ASCII become `\DDD` octal */
function escapeChar(ch: string): string {
  if (ch === '"' || ch === '\\') return `\\${ch}`;
  const code = ch.charCodeAt(0);
  if (ch.length === 1 && code >= 0x20 && code < 0x7f) return ch;
  return [...Buffer.from(ch, 'utf8')]
    .map((byte) => `\\${byte.toString(8).padStart(3, '0')}`)
    .join('');
}

/**
 * Encode a TXT value as zone-file character strings: escaped, quoted, and
 * split into strings of at most 255 bytes (`"part one" "part two"`).
 * Characters are never split across strings.
 *
 * Values that are already quoted are taken to be encoded.
 */
export function encodeTxtValue(value: string): string {
  if (value.startsWith('"')) return value;

  const chunks: string[] = [];
  let chunk = '';
  let chunkBytes = 0;
  for (const ch of value) {
    const bytes = Buffer.byteLength(ch, 'utf8');
    if (chunkBytes + bytes > MAX_TXT_STRING) {
      chunks.push(chunk);
      chunk = '';
      chunkBytes = 0;
    }
    chunk += escapeChar(ch);
    chunkBytes += bytes;
  }
  chunks.push(chunk);

  return chunks.map((c) => `"${c}"`).join(' ');
}

/**
 * Decode zone-file character strings back into one value, including `\DDD`
 * octal escapes. Unquoted input is returned unchanged.
 */
export function decodeTxtValue(wire: string): string {
  const trimmed = wire.trim();
  if (!trimmed.startsWith('"')) return wire;

  const bytes: number[] = [];
  let inString = false;
  for (let i = 0; i < trimmed.length; i++) {
    const ch = trimmed.charAt(i);
    if (!inString) {
      if (ch === '"') inString = true;
      continue;
    }
    if (ch === '\\' && i + 1 < trimmed.length) {
      const octal = /^[0-7]{3}/.exec(trimmed.slice(i + 1, i + 4));
      if (octal) {
        bytes.push(parseInt(octal[0], 8));
        i += 3;
      } else {
        bytes.push(...Buffer.from(trimmed.charAt(i + 1), 'utf8'));
        i++;
      }
    } else if (ch === '"') {
      inString = false;
    } else {
      bytes.push(...Buffer.from(ch, 'utf8'));
    }
  }
  return Buffer.from(bytes).toString('utf8');
}
