import { reindent } from './interpolate.js';

/**
 * Append-only, human-readable record of one case's execution
 */
export class Transcript {
  private text = '';

  /** Append `raw` exactly as given */
  append(raw: string): void {
    this.text += raw;
  }

  /** Append `line` and a newline */
  line(line: string): void {
    this.text += line + '\n';
  }

  /** Append command output, ending it with a newline when it lacks one */
  output(output: string): void {
    if (output === '') return;
    this.text += output.endsWith('\n') ? output : output + '\n';
  }

  toString(): string {
    return this.text;
  }

  render(indent: number = 0, prefix: string = ''): string {
    return reindent(this.text, indent, prefix);
  }
}
