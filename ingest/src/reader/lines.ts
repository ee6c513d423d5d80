/**
 * Line source
 *
 * Splits raw file bytes on '\n' (dropping a CR before it) and decodes each
 * line as strict UTF-8. An undecodable line becomes an error result for that
 * line only. A trailing newline does not produce an extra empty line.
 */

const LF = 0x0a;
const CR = 0x0d;

export type LineResult =
  | { ok: true; lineNumber: number; line: string }
  | { ok: false; lineNumber: number; error: Error };

export function* splitLines(bytes: Uint8Array): Generator<LineResult> {
  const decoder = new TextDecoder('utf-8', { fatal: true });
  let start = 0;
  let lineNumber = 0;

  while (start < bytes.length) {
    const lf = bytes.indexOf(LF, start);
    const hasNewline = lf !== -1;
    let end = hasNewline ? lf : bytes.length;
    if (hasNewline && end > start && bytes[end - 1] === CR) end--;

    lineNumber++;
    let result: LineResult;
    try {
      result = { ok: true, lineNumber, line: decoder.decode(bytes.subarray(start, end)) };
    } catch (err) {
      result = { ok: false, lineNumber, error: err instanceof Error ? err : new Error(String(err)) };
    }
    yield result;

    start = hasNewline ? lf + 1 : bytes.length;
  }
}
