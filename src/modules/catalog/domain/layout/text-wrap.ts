/**
 * Greedy word wrap to `width` characters per line. Whitespace runs collapse; words longer
 * than the width are split, filling whatever room is left on the current line first.
 */
export function wrapText(text: string, maxWidth: number): string[] {
  const width = Math.max(1, Math.trunc(maxWidth));
  const lines: string[] = [];
  let current = '';

  for (const word of text.split(/\s+/).filter((part) => part.length > 0)) {
    let rest = word;

    while (rest.length > 0) {
      const separator = current.length > 0 ? ' ' : '';

      if (current.length + separator.length + rest.length <= width) {
        current += separator + rest;
        rest = '';
        break;
      }

      if (rest.length > width) {
        const room = width - current.length - separator.length;
        if (room > 0) {
          current += separator + rest.slice(0, room);
          rest = rest.slice(room);
        }
      }

      lines.push(current);
      current = '';
    }
  }

  if (current.length > 0) {
    lines.push(current);
  }

  return lines;
}

/**
 * Display title: everything before the first `-` (variant suffix), trimmed.
 */
export function displayTitle(name: string): string {
  return name.split('-')[0].trim();
}
