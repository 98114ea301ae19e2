const encoder = new TextEncoder();
const decoder = new TextDecoder();
const strictDecoder = new TextDecoder("utf-8", { fatal: true });

export function fromString(text: string): Uint8Array {
  return encoder.encode(text);
}

export function decodeToString(data: Uint8Array): string {
  return decoder.decode(data);
}

/** Like `decodeToString`, but throws a TypeError on invalid UTF-8. */
export function decodeStrict(data: Uint8Array): string {
  return strictDecoder.decode(data);
}

export function concat(chunks: Uint8Array[]): Uint8Array {
  let total = 0;
  for (const chunk of chunks) {
    total += chunk.length;
  }

  const result = new Uint8Array(total);
  let offset = 0;
  for (const chunk of chunks) {
    result.set(chunk, offset);
    offset += chunk.length;
  }
  return result;
}

const CR = 13;
const LF = 10;

/**
 * Split bytes on line boundaries (`\r\n`, `\n` or a lone `\r`).
 * A trailing terminator does not start an extra empty line.
 */
export function splitLines(data: Uint8Array): Uint8Array[] {
  const lines: Uint8Array[] = [];
  let start = 0;
  let i = 0;

  while (i < data.length) {
    const byte = data[i];
    if (byte !== CR && byte !== LF) {
      i++;
      continue;
    }

    lines.push(data.subarray(start, i));
    i += byte === CR && data[i + 1] === LF ? 2 : 1;
    start = i;
  }

  if (start < data.length) {
    lines.push(data.subarray(start));
  }
  return lines;
}

// ASCII whitespace: \t \n \v \f \r and space
function isAsciiWhitespace(byte: number): boolean {
  return byte === 32 || (byte >= 9 && byte <= 13);
}

export function isBlank(data: Uint8Array): boolean {
  return data.every(isAsciiWhitespace);
}
