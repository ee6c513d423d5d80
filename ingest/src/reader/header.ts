/** Holds the names of the columns, verbatim and in file order */
export type Header = readonly string[];

export function parseHeader(line: string, delimiter: string): Header {
  return line.split(delimiter);
}
