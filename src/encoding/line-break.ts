/**
 * Hard-wraps text every `width` characters.
 * The separator is inserted between chunks, never after the last one.
 *
 * @param data - Text to wrap
 * @param width - Characters per line
 * @param separator - Line separator
 */
export function breakLines(data: string, width: number, separator: string): string {
  if (data.length <= width) {
    return data;
  }

  const lines: string[] = [];
  for (let start = 0; start < data.length; start += width) {
    lines.push(data.substring(start, start + width));
  }
  return lines.join(separator);
}

