import { describe, it, expect } from 'vitest';
import { FrameDecoder, encodeFrame, pathModality } from '../../../src/ingress/framing.js';

describe('FrameDecoder', () => {
  it('assembles a frame split across chunks', () => {
    const decoder = new FrameDecoder();

    expect(decoder.push('/chat\nI feel ')).toEqual([]);
    expect(decoder.hasPartial()).toBe(true);
    expect(decoder.push('lonely\r\n---\n')).toEqual([{ path: '/chat', text: 'I feel lonely' }]);
    expect(decoder.hasPartial()).toBe(false);
  });

  it('decodes several frames from one chunk, keeping blank lines inside a frame', () => {
    const decoder = new FrameDecoder();

    expect(decoder.push('\n/heard\nhello\n\nworld\n---  \n\n/seen\n---\n')).toEqual([
      { path: '/heard', text: 'hello\n\nworld' },
      { path: '/seen', text: '' },
    ]);
  });

  it('drops trailing blank lines before the terminator', () => {
    expect(new FrameDecoder().push('/chat\nhi\n\n---\n')).toEqual([{ path: '/chat', text: 'hi' }]);
  });

  it('does not treat an indented or longer marker as a terminator', () => {
    const decoder = new FrameDecoder();

    expect(decoder.push('/chat\n ---\n----\n---\n')).toEqual([{ path: '/chat', text: ' ---\n----' }]);
  });

  it('forgets a partial frame on reset', () => {
    const decoder = new FrameDecoder();
    decoder.push('/chat\nhalf');
    decoder.reset();

    expect(decoder.hasPartial()).toBe(false);
    expect(decoder.push('/seen\na cat\n---\n')).toEqual([{ path: '/seen', text: 'a cat' }]);
  });
});

describe('encodeFrame', () => {
  it('writes path, text and terminator lines', () => {
    expect(encodeFrame({ path: '/chat', text: 'a\nb' })).toBe('/chat\na\nb\n---\n');
    expect(encodeFrame({ path: '/seen', text: '' })).toBe('/seen\n---\n');
  });
});

describe('pathModality', () => {
  it('takes the first path segment', () => {
    expect(pathModality('/heard/mic')).toBe('heard');
    expect(pathModality('chat')).toBe('chat');
    expect(pathModality('///')).toBe('unknown');
  });
});
