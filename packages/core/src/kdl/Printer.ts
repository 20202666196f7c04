/**
 * Line-oriented writer for KDL output.
 * Every line is prefixed with one tab per open block, so indentation
 * accumulates with nesting depth.
 */
export class Printer {
  private lines: string[] = [];
  private depth = 0;

  /**
   * Write a full line at the current indentation.
   */
  line(text: string): this {
    this.lines.push("\t".repeat(this.depth) + text);
    return this;
  }

  /**
   * Utility writer to write only the given parts and join with " "
   */
  lineParts(...parts: (string | undefined)[]): this {
    return this.line(
      parts.filter((part): part is string => part !== undefined).join(" ")
    );
  }

  /**
   * Open a nested block: following lines are indented one more level.
   */
  pushIndentation(): this {
    this.depth++;
    return this;
  }

  /**
   * Close the innermost block.
   */
  popIndentation(): this {
    if (this.depth > 0) this.depth--;
    return this;
  }

  /**
   * Get the accumulated lines joined with "\n", without a trailing newline
   */
  toString(): string {
    return this.lines.join("\n");
  }
}
