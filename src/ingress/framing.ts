/**
 * Ingress frame codec.
 *
 * A frame is a path line, any number of text lines, and a terminator line
 * that reads exactly `---` (trailing whitespace ignored):
 *
 *   /chat
 *   I feel lonely
 *   ---
 *
 * One connection may carry any number of frames.
 */

export const FRAME_TERMINATOR = '---';

export interface Frame {
  /** Target pipeline path, e.g. "/chat" */
  path: string;
  /** Text lines joined with "\n" */
  text: string;
}

export function encodeFrame(frame: Frame): string {
  const body = frame.text.length > 0 ? `${frame.text}\n` : '';
  return `${frame.path}\n${body}${FRAME_TERMINATOR}\n`;
}

/**
 * First segment of a path: "/chat" → "chat", "/heard/mic" → "heard".
 */
export function pathModality(path: string): string {
  const segment = path.split('/').find((part) => part.length > 0);
  return segment ?? 'unknown';
}

/**
 * Incremental decoder. Feed raw chunks, get back whole frames.
 */
export class FrameDecoder {
  private buffer = '';
  private path: string | null = null;
  private lines: string[] = [];

  push(chunk: string): Frame[] {
    this.buffer += chunk;
    const frames: Frame[] = [];

    let newline = this.buffer.indexOf('\n');
    while (newline >= 0) {
      const line = this.buffer.slice(0, newline).replace(/\r$/, '');
      this.buffer = this.buffer.slice(newline + 1);
      const frame = this.acceptLine(line);
      if (frame) frames.push(frame);
      newline = this.buffer.indexOf('\n');
    }

    return frames;
  }

  /**
   * True while a frame has started but not been terminated.
   */
  hasPartial(): boolean {
    return this.path !== null || this.buffer.length > 0;
  }

  reset(): void {
    this.buffer = '';
    this.path = null;
    this.lines = [];
  }

  private acceptLine(line: string): Frame | null {
    if (this.path === null) {
      const path = line.trim();
      // Blank lines between frames
      if (path.length > 0) this.path = path;
      return null;
    }

    if (line.trimEnd() === FRAME_TERMINATOR) {
      const frame = { path: this.path, text: this.lines.join('\n').replace(/\n+$/, '') };
      this.path = null;
      this.lines = [];
      return frame;
    }

    this.lines.push(line);
    return null;
  }
}
