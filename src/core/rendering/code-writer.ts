/**
 * Code Writer - line buffer behind the text renderer
 *
 * Rendering routines write fragments independently. A routine that wants its
 * next fragment to land on the previous line calls `continueLine()` first;
 * the flag is consumed by the very next `write`.
 */

/** Four spaces per nesting level */
const INDENT_UNIT = '    ';

export class CodeWriter {
  private readonly lines: string[] = [];

  private level = 0;

  /** When set, the next `write` extends the last stored line */
  private continuesLastLine = false;

  /**
   * Current nesting level
   */
  get depth(): number {
    return this.level;
  }

  /**
   * Write a fragment, either as a new indented line or onto the last line
   * when `continueLine()` was called before.
   *
   * An empty fragment on a new line produces an empty line, without
   * indentation.
   */
  write(fragment: string): void {
    const last = this.lines.length - 1;
    if (this.continuesLastLine && last >= 0) {
      this.lines[last] += fragment;
    } else if (fragment.length === 0) {
      this.lines.push('');
    } else {
      this.lines.push(INDENT_UNIT.repeat(this.level) + fragment);
    }
    this.continuesLastLine = false;
  }

  /**
   * Make the next `write` continue the last stored line.
   * Calling it repeatedly before a write has no further effect.
   */
  continueLine(): void {
    this.continuesLastLine = true;
  }

  /**
   * Run `work` one level deeper; the level is restored on every exit path
   */
  withNestedLevel<T>(work: () => T): T {
    this.level += 1;
    try {
      return work();
    } finally {
      this.level -= 1;
    }
  }

  /**
   * All stored lines joined with newlines
   */
  rendered(): string {
    return this.lines.join('\n');
  }
}
