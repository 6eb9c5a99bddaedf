import type { FrameData, StackFrame } from "@/types";

/**
 * A single step in a stack trace. Instances are frozen on construction.
 */
export class Frame implements StackFrame {
  readonly func: string;
  readonly path: string;
  readonly line: number;

  constructor({ func, path, line }: FrameData) {
    this.func = func;
    this.path = path;
    this.line = line;

    Object.freeze(this);
  }

  /**
   * Builds a frame from a plain record, reusing it when it already is one.
   */
  static from(data: FrameData): Frame {
    return data instanceof Frame ? data : new Frame(data);
  }

  /**
   * Renders the frame as `"<path>:<line> <func>()"`.
   */
  describe(): string {
    return `${this.path}:${this.line} ${this.func}()`;
  }

  toString(): string {
    return this.describe();
  }

  toJSON(): FrameData {
    return { func: this.func, path: this.path, line: this.line };
  }
}
