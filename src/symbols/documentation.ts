/**
 * Leading Comment Collection
 * Associates comments written directly above a declaration with it.
 */

const LINE_COMMENT = /^\/\/\s?(.*)$/;
const SINGLE_LINE_BLOCK = /^\/\*(.*)\*\/$/;

/**
 * Collect the comment text above a 0-based line, bottom-up.
 *
 * Accepts `//` lines, single-line `/* ... *\/` blocks and full multi-line
 * blocks (found by scanning upward for the opening `/*`). Blank lines are
 * skipped; the first other line stops collection.
 *
 * @returns Comment lines joined with `\n`, or an empty string
 */
export function collectLeadingComment(
  lines: readonly string[],
  declarationLine: number
): string {
  const collected: string[] = [];
  let i = declarationLine - 1;

  while (i >= 0) {
    const line = (lines[i] ?? '').trim();

    if (line === '') {
      i--;
      continue;
    }

    const lineComment = LINE_COMMENT.exec(line);
    if (lineComment) {
      collected.unshift((lineComment[1] ?? '').trimEnd());
      i--;
      continue;
    }

    const singleBlock = SINGLE_LINE_BLOCK.exec(line);
    if (singleBlock) {
      collected.unshift((singleBlock[1] ?? '').trim());
      i--;
      continue;
    }

    if (line.endsWith('*/')) {
      const opener = findBlockOpener(lines, i);
      if (opener < 0) break;
      collected.unshift(...blockBody(lines.slice(opener, i + 1)));
      i = opener - 1;
      continue;
    }

    break;
  }

  return collected.join('\n');
}

/** Line opening the block that closes on `closer`; -1 when it is code */
function findBlockOpener(lines: readonly string[], closer: number): number {
  for (let j = closer; j >= 0; j--) {
    const line = (lines[j] ?? '').trim();
    if (line.includes('/*')) return line.startsWith('/*') ? j : -1;
  }
  return -1;
}

/** Strip delimiters and leading ` * ` gutters from a block comment */
function blockBody(block: readonly string[]): string[] {
  const body: string[] = [];
  block.forEach((raw, index) => {
    let line = raw.trim();
    if (index === 0) line = line.slice(line.indexOf('/*') + 2);
    if (index === block.length - 1) {
      line = line.slice(0, line.lastIndexOf('*/'));
    }
    line = line.replace(/^\*+\s?/, '').trim();
    if (line !== '') body.push(line);
  });
  return body;
}
