import { formatToolContent, parseToolArguments } from '../lib/tool-content';

describe('parseToolArguments', () => {
  it('parses a JSON object', () => {
    expect(parseToolArguments('{"topic":"optics","max_results":2}')).toEqual({
      ok: true,
      value: { topic: 'optics', max_results: 2 },
    });
  });

  it('fails on malformed JSON and on non-object values', () => {
    expect(parseToolArguments('{invalid json').ok).toBe(false);
    expect(parseToolArguments('[1]').ok).toBe(false);
    expect(parseToolArguments('null').ok).toBe(false);

    const scalar = parseToolArguments('"text"');
    expect(!scalar.ok && scalar.error.message).toBe('Tool arguments must be a JSON object, got: "text"');
  });
});

describe('formatToolContent', () => {
  it('joins text parts with newlines and serializes other parts', () => {
    const result = {
      content: [
        { type: 'text', text: 'first' },
        { type: 'image', data: 'AAAA', mimeType: 'image/png' },
        { type: 'text', text: 'second' },
      ],
    };

    expect(formatToolContent(result)).toBe(
      'first\n{"type":"image","data":"AAAA","mimeType":"image/png"}\nsecond'
    );
  });

  it('passes strings through and serializes anything else', () => {
    expect(formatToolContent('plain')).toBe('plain');
    expect(formatToolContent({ toolResult: { count: 2 } })).toBe('{"count":2}');
    expect(formatToolContent({ count: 2 })).toBe('{"count":2}');
    expect(formatToolContent(undefined)).toBe('undefined');
  });
});
