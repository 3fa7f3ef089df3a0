/**
 * Append-only text buffer that values print into.
 */
export class TextBuffer {
  private parts: string[] = [];
  private size = 0;

  append(text: string): this {
    this.parts.push(text);
    this.size += text.length;
    return this;
  }

  get length(): number {
    return this.size;
  }

  toString(): string {
    return this.parts.join("");
  }
}
