import { describe, it, expect } from 'vitest';
import { StreamParser, parseAttributes, unescapeXml } from '../../../src/will/stream-parser.js';
import type { StreamParserListener } from '../../../src/will/stream-parser.js';

type ParserEvent =
  | { type: 'text'; text: string }
  | { type: 'open'; action: string; attributes: Record<string, string> }
  | { type: 'body'; action: string; chunk: string }
  | { type: 'close'; action: string }
  | { type: 'malformed'; reason: string; raw: string }
  | { type: 'unterminated'; action: string | null; raw: string };

function createRecorder(known: string[] = ['speak', 'log', 'read_source']): {
  parser: StreamParser;
  events: ParserEvent[];
} {
  const events: ParserEvent[] = [];
  const listener: StreamParserListener = {
    onText: (text) => events.push({ type: 'text', text }),
    onOpen: (action, attributes) => events.push({ type: 'open', action, attributes }),
    onBody: (action, chunk) => events.push({ type: 'body', action, chunk }),
    onClose: (action) => events.push({ type: 'close', action }),
    onMalformed: (reason, raw) => events.push({ type: 'malformed', reason, raw }),
    onUnterminated: (action, raw) => events.push({ type: 'unterminated', action, raw }),
  };
  return { parser: new StreamParser((action) => known.includes(action), listener), events };
}

function bodyOf(events: ParserEvent[]): string {
  return events.map((e) => (e.type === 'body' ? e.chunk : '')).join('');
}

function textOf(events: ParserEvent[]): string {
  return events.map((e) => (e.type === 'text' ? e.text : '')).join('');
}

describe('StreamParser', () => {
  it('opens, streams and closes a tag', () => {
    const { parser, events } = createRecorder();
    parser.push('<speak>Hello.</speak>');
    parser.end();

    expect(events).toEqual([
      { type: 'open', action: 'speak', attributes: {} },
      { type: 'body', action: 'speak', chunk: 'Hello.' },
      { type: 'close', action: 'speak' },
    ]);
    expect(parser.getState()).toBe('SEEKING_TAG');
  });

  it('skips a malformed tag and still parses the good one after it', () => {
    const { parser, events } = createRecorder();
    parser.push('<speak oops>bad</speak><speak>Hello.</speak>');
    parser.end();

    const malformed = events.filter((e) => e.type === 'malformed');
    expect(malformed).toEqual([
      { type: 'malformed', reason: 'Malformed tag', raw: '<speak oops>' },
      { type: 'malformed', reason: 'Closing tag without an open tag', raw: '</speak>' },
    ]);
    expect(events.filter((e) => e.type === 'open')).toHaveLength(1);
    expect(events.filter((e) => e.type === 'close')).toEqual([{ type: 'close', action: 'speak' }]);
    expect(bodyOf(events)).toBe('Hello.');
  });

  it('abandons a header where a new tag starts inside it', () => {
    const { parser, events } = createRecorder();
    parser.push('<speak oops <speak>Hello.</speak>');
    parser.end();

    expect(events).toEqual([
      { type: 'malformed', reason: 'Malformed tag', raw: '<speak oops ' },
      { type: 'open', action: 'speak', attributes: {} },
      { type: 'body', action: 'speak', chunk: 'Hello.' },
      { type: 'close', action: 'speak' },
    ]);
  });

  it('keeps a "<" inside a quoted attribute value', () => {
    const { parser, events } = createRecorder();
    parser.push('<log level="a<b"/>');
    parser.end();

    expect(events).toEqual([
      { type: 'open', action: 'log', attributes: { level: 'a<b' } },
      { type: 'close', action: 'log' },
    ]);
  });

  it('unescapes entities in attributes and in a body split mid-entity', () => {
    const { parser, events } = createRecorder();
    parser.push('<speak mood="calm &amp; warm">Fish &amp; ch');
    parser.push('ips &lt;3</speak>');
    parser.end();

    expect(events).toEqual([
      { type: 'open', action: 'speak', attributes: { mood: 'calm & warm' } },
      { type: 'body', action: 'speak', chunk: 'Fish ' },
      { type: 'body', action: 'speak', chunk: '& chips <3' },
      { type: 'close', action: 'speak' },
    ]);
  });

  it('handles tags split across chunks and streams the body incrementally', () => {
    const { parser, events } = createRecorder();
    for (const chunk of ['<spe', 'ak>Hel', 'lo</sp', 'eak>']) {
      parser.push(chunk);
    }
    parser.end();

    const bodies = events.filter((e) => e.type === 'body');
    expect(bodies).toEqual([
      { type: 'body', action: 'speak', chunk: 'He' },
      { type: 'body', action: 'speak', chunk: 'llo' },
    ]);
    expect(events.at(-1)).toEqual({ type: 'close', action: 'speak' });
  });

  it('parses attributes and completes self-closing tags with an empty body', () => {
    const { parser, events } = createRecorder();
    parser.push('<log level="info"/>');
    parser.end();

    expect(events).toEqual([
      { type: 'open', action: 'log', attributes: { level: 'info' } },
      { type: 'close', action: 'log' },
    ]);
  });

  it('skips the body of an unknown action', () => {
    const { parser, events } = createRecorder();
    parser.push('<dance>wiggle</dance><speak>Hi</speak>');
    parser.end();

    expect(events[0]).toEqual({ type: 'malformed', reason: 'Unknown action "dance"', raw: '<dance>' });
    expect(textOf(events)).toBe('');
    expect(bodyOf(events)).toBe('Hi');
    expect(events.filter((e) => e.type === 'open')).toEqual([{ type: 'open', action: 'speak', attributes: {} }]);
  });

  it('reports an unterminated tag at end of stream', () => {
    const { parser, events } = createRecorder();
    parser.push('<speak>Hello there');
    parser.end();

    expect(events.filter((e) => e.type === 'close')).toHaveLength(0);
    expect(events.at(-1)).toEqual({ type: 'unterminated', action: 'speak', raw: '<speak>Hello there' });
  });

  it('reports a header cut off by the end of stream', () => {
    const { parser, events } = createRecorder();
    parser.push('<speak level="lo');
    parser.end();

    expect(events).toEqual([{ type: 'unterminated', action: null, raw: '<speak level="lo' }]);
  });

  it('passes text outside tags through as reasoning', () => {
    const { parser, events } = createRecorder();
    parser.push('I am thinking. <speak>x</speak> done');
    parser.end();

    expect(textOf(events)).toBe('I am thinking.  done');
  });

  it('treats a lone "<" as text', () => {
    const { parser, events } = createRecorder();
    parser.push('a < b');
    parser.end();

    expect(textOf(events)).toBe('a < b');
    expect(events.some((e) => e.type === 'malformed')).toBe(false);
  });

  it('drops a header that spans lines', () => {
    const { parser, events } = createRecorder();
    parser.push('<speak\nhello');
    parser.end();

    expect(events[0]).toEqual({ type: 'malformed', reason: 'Tag header never closed', raw: '<speak' });
    expect(textOf(events)).toBe('\nhello');
  });

  it('matches the closing marker case-insensitively', () => {
    const { parser, events } = createRecorder();
    parser.push('<speak>Hi</SPEAK>');
    parser.end();

    expect(bodyOf(events)).toBe('Hi');
    expect(events.at(-1)).toEqual({ type: 'close', action: 'speak' });
  });
});

describe('parseAttributes', () => {
  it('reads name="value" pairs', () => {
    expect(parseAttributes(' path="src/a.ts" block="2"')).toEqual({ path: 'src/a.ts', block: '2' });
  });

  it('keeps empty values', () => {
    expect(parseAttributes(' level=""')).toEqual({ level: '' });
  });
});

describe('unescapeXml', () => {
  it('replaces named and numeric entities once', () => {
    expect(unescapeXml('&quot;hi&quot; &#39;x&#x27; &amp;lt;')).toBe('"hi" \'x\' &lt;');
  });

  it('keeps unknown entities as written', () => {
    expect(unescapeXml('&nbsp; & done')).toBe('&nbsp; & done');
  });
});
