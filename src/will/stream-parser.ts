/**
 * Incremental action-tag parser.
 *
 * Consumes model output chunk by chunk and recognizes action tags:
 *
 *   <speak>Hello there.</speak>
 *   <read_source path="src/index.ts" block="1"></read_source>
 *   <log level="info"/>
 *
 * States: SEEKING_TAG → PARSING_ATTRIBUTES → STREAMING_BODY → SEEKING_TAG.
 * Body text is reported as it arrives, so a listener can start speaking
 * before the sentence is finished. A malformed or unknown tag is reported
 * and skipped; parsing always resumes at SEEKING_TAG. Attribute values and
 * body text are XML-unescaped (`&amp;`, `&lt;`, `&#39;`, ...).
 */

export type ParserState = 'SEEKING_TAG' | 'PARSING_ATTRIBUTES' | 'STREAMING_BODY';

export interface StreamParserListener {
  /** Text outside any tag */
  onText(text: string): void;
  /** A known action tag opened */
  onOpen(action: string, attributes: Record<string, string>): void;
  /** Body text of the open tag */
  onBody(action: string, chunk: string): void;
  /** The open tag closed (or was self-closing) */
  onClose(action: string): void;
  /** A tag was skipped */
  onMalformed(reason: string, raw: string): void;
  /** The stream ended inside a tag */
  onUnterminated(action: string | null, raw: string): void;
}

const TAG_HEADER = /^<([a-zA-Z0-9_]+)((?:\s+[a-zA-Z0-9_]+="[^"]*")*)\s*(\/?)>$/;
const ATTRIBUTE = /([a-zA-Z0-9_]+)="([^"]*)"/g;
const TAG_NAME_START = /[a-zA-Z0-9_/]/;
/** A header longer than this, or one spanning lines, is not a tag */
const MAX_HEADER_LENGTH = 512;
const ENTITY = /&(?:#(\d+)|#x([0-9a-fA-F]+)|([a-zA-Z]+));/g;
/** Longest entity worth holding back at a chunk boundary, e.g. `&#x1F600;` */
const MAX_ENTITY_LENGTH = 10;

const NAMED_ENTITIES: Readonly<Record<string, string>> = {
  amp: '&',
  lt: '<',
  gt: '>',
  quot: '"',
  apos: "'",
};

/**
 * Replace XML entities. Unknown or out-of-range ones are kept as written.
 */
export function unescapeXml(text: string): string {
  if (!text.includes('&')) return text;
  return text.replace(ENTITY, (entity: string, dec?: string, hex?: string, name?: string) => {
    if (name !== undefined) {
      return NAMED_ENTITIES[name] ?? entity;
    }
    const code = dec !== undefined ? Number.parseInt(dec, 10) : Number.parseInt(hex ?? '', 16);
    return Number.isInteger(code) && code >= 0 && code <= 0x10ffff ? String.fromCodePoint(code) : entity;
  });
}

/**
 * Index at which `text[0, end)` can be emitted without cutting an entity in two.
 */
function entitySafeEnd(text: string, end: number): number {
  const amp = text.lastIndexOf('&', end - 1);
  if (amp < 0 || end - amp >= MAX_ENTITY_LENGTH || text.slice(amp, end).includes(';')) {
    return end;
  }
  return amp;
}

/** Position of '<' outside quoted values at or after `from`, or -1 */
function nextUnquotedOpen(header: string, from: number): number {
  let quoted = false;
  for (let i = 0; i < header.length; i++) {
    const ch = header.charAt(i);
    if (ch === '"') quoted = !quoted;
    else if (ch === '<' && !quoted && i >= from) return i;
  }
  return -1;
}

export function parseAttributes(raw: string): Record<string, string> {
  const attributes: Record<string, string> = {};
  for (const match of raw.matchAll(ATTRIBUTE)) {
    const [, name, value] = match;
    if (name !== undefined && value !== undefined) {
      attributes[name] = unescapeXml(value);
    }
  }
  return attributes;
}

export class StreamParser {
  private state: ParserState = 'SEEKING_TAG';
  private buffer = '';
  /** Open tag: its action (null when skipping an unknown tag's body) and closing marker */
  private open: { action: string | null; closing: string; raw: string } | null = null;

  private readonly isKnown: (action: string) => boolean;
  private readonly listener: StreamParserListener;

  constructor(isKnown: (action: string) => boolean, listener: StreamParserListener) {
    this.isKnown = isKnown;
    this.listener = listener;
  }

  getState(): ParserState {
    return this.state;
  }

  push(chunk: string): void {
    this.buffer += chunk;
    let progressed = true;
    while (progressed && this.buffer.length > 0) {
      switch (this.state) {
        case 'SEEKING_TAG':
          progressed = this.seekTag();
          break;
        case 'PARSING_ATTRIBUTES':
          progressed = this.parseHeader();
          break;
        case 'STREAMING_BODY':
          progressed = this.streamBody();
          break;
      }
    }
  }

  /**
   * End of stream. Pending text is flushed; an unfinished tag is reported
   * and discarded.
   */
  end(): void {
    switch (this.state) {
      case 'SEEKING_TAG':
        if (this.buffer.length > 0) this.listener.onText(this.buffer);
        break;
      case 'PARSING_ATTRIBUTES':
        this.listener.onUnterminated(null, this.buffer);
        break;
      case 'STREAMING_BODY':
        if (this.open) {
          this.listener.onUnterminated(this.open.action, this.open.raw + this.buffer);
        }
        break;
    }
    this.buffer = '';
    this.open = null;
    this.state = 'SEEKING_TAG';
  }

  private seekTag(): boolean {
    const start = this.buffer.indexOf('<');
    if (start < 0) {
      this.listener.onText(this.buffer);
      this.buffer = '';
      return false;
    }
    if (start > 0) {
      this.listener.onText(this.buffer.slice(0, start));
      this.buffer = this.buffer.slice(start);
    }
    this.state = 'PARSING_ATTRIBUTES';
    return true;
  }

  private parseHeader(): boolean {
    const next = this.buffer.charAt(1);
    if (next !== '' && !TAG_NAME_START.test(next)) {
      // "a < b": not a tag at all
      this.listener.onText('<');
      this.buffer = this.buffer.slice(1);
      this.state = 'SEEKING_TAG';
      return true;
    }

    const close = this.buffer.indexOf('>');
    const newline = this.buffer.indexOf('\n');
    const reopen = nextUnquotedOpen(this.buffer, 1);
    if (reopen >= 0 && (close < 0 || reopen < close) && (newline < 0 || reopen < newline)) {
      // "<speak oops <speak>": the first header is abandoned where the next one starts
      this.skip('Malformed tag', this.buffer.slice(0, reopen));
      return true;
    }
    if (close < 0) {
      if (newline >= 0 || this.buffer.length > MAX_HEADER_LENGTH) {
        const cut = newline >= 0 ? newline : this.buffer.length;
        this.skip('Tag header never closed', this.buffer.slice(0, cut));
        return true;
      }
      return false;
    }
    if (newline >= 0 && newline < close) {
      this.skip('Tag header spans lines', this.buffer.slice(0, newline));
      return true;
    }

    const raw = this.buffer.slice(0, close + 1);
    this.buffer = this.buffer.slice(close + 1);
    const match = TAG_HEADER.exec(raw);
    if (!match) {
      this.listener.onMalformed(raw.startsWith('</') ? 'Closing tag without an open tag' : 'Malformed tag', raw);
      this.state = 'SEEKING_TAG';
      return true;
    }

    const name = match[1] ?? '';
    const selfClosing = match[3] === '/';
    const known = this.isKnown(name);

    if (!known) {
      this.listener.onMalformed(`Unknown action "${name}"`, raw);
      if (selfClosing) {
        this.state = 'SEEKING_TAG';
        return true;
      }
    } else {
      this.listener.onOpen(name, parseAttributes(match[2] ?? ''));
      if (selfClosing) {
        this.listener.onClose(name);
        this.state = 'SEEKING_TAG';
        return true;
      }
    }

    this.open = { action: known ? name : null, closing: `</${name.toLowerCase()}>`, raw };
    this.state = 'STREAMING_BODY';
    return true;
  }

  private streamBody(): boolean {
    const open = this.open;
    if (!open) {
      this.state = 'SEEKING_TAG';
      return true;
    }

    const index = this.buffer.toLowerCase().indexOf(open.closing);
    if (index >= 0) {
      this.emitBody(open.action, this.buffer.slice(0, index));
      this.buffer = this.buffer.slice(index + open.closing.length);
      if (open.action !== null) {
        this.listener.onClose(open.action);
      }
      this.open = null;
      this.state = 'SEEKING_TAG';
      return true;
    }

    // Hold back what could be the start of the closing marker or of an entity
    const safe = entitySafeEnd(this.buffer, this.buffer.length - (open.closing.length - 1));
    if (safe > 0) {
      this.emitBody(open.action, this.buffer.slice(0, safe));
      open.raw += this.buffer.slice(0, safe);
      this.buffer = this.buffer.slice(safe);
    }
    return false;
  }

  private emitBody(action: string | null, chunk: string): void {
    if (action !== null && chunk.length > 0) {
      this.listener.onBody(action, unescapeXml(chunk));
    }
  }

  private skip(reason: string, raw: string): void {
    this.listener.onMalformed(reason, raw);
    this.buffer = this.buffer.slice(raw.length);
    this.state = 'SEEKING_TAG';
  }
}
