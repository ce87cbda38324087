/**
 * Model Response Parsing Tests
 *
 * Covers provider payload decoding, fence stripping and JSON parsing.
 */

import {
  decodeResponsesPayload,
  extractResponseText,
  stripCodeFences,
  parseModelResponse,
  EmptyModelResponseError,
  MalformedModelJsonError,
  MALFORMED_SNIPPET_LENGTH,
} from '@scanfields/shared';

describe('Provider response decoding', () => {
  it('prefers a non-blank output_text field', () => {
    const response = decodeResponsesPayload({
      output_text: '  {"a": 1}  ',
      output: [{ type: 'message', content: [{ type: 'output_text', text: 'ignored' }] }],
    });

    expect(response).toEqual({ shape: 'output_text', text: '  {"a": 1}  ' });
    expect(extractResponseText(response)).toBe('{"a": 1}');
  });

  it('joins textual content blocks in order when output_text is blank', () => {
    const response = decodeResponsesPayload({
      output_text: '   ',
      output: [
        { type: 'reasoning' },
        {
          type: 'message',
          content: [
            { type: 'output_text', text: '{"a"' },
            { type: 'refusal' },
            { type: 'text', text: ': 1}' },
          ],
        },
      ],
    });

    expect(response.shape).toBe('content_blocks');
    expect(extractResponseText(response)).toBe('{"a": 1}');
  });

  it('yields empty text when the payload carries none', () => {
    expect(extractResponseText(decodeResponsesPayload({}))).toBe('');
    expect(extractResponseText(decodeResponsesPayload({ output_text: null, output: [{ type: 'reasoning' }] }))).toBe('');
  });
});

describe('stripCodeFences', () => {
  it('removes a fence with a language tag', () => {
    expect(stripCodeFences('```json\n{"a":1}\n```')).toBe('{"a":1}');
  });

  it('removes a bare fence', () => {
    expect(stripCodeFences('```\n{"a":1}\n```\n')).toBe('{"a":1}');
  });

  it('treats a bare carriage return as a line break', () => {
    expect(stripCodeFences('```json\r{"a":1}\r```')).toBe('{"a":1}');
    expect(stripCodeFences('```json\r\n{"a":1}\r\n```')).toBe('{"a":1}');
  });

  it('removes an opening fence with no closing fence', () => {
    expect(stripCodeFences('```json\n{"a":2}')).toBe('{"a":2}');
  });

  it('only trims unfenced text', () => {
    expect(stripCodeFences('  {"a":1}\n')).toBe('{"a":1}');
  });
});

describe('parseModelResponse', () => {
  it('parses fenced and unfenced JSON to the same value', () => {
    const fenced = parseModelResponse('```json\n{"a":1}\n```');
    const plain = parseModelResponse('{"a":1}');

    expect(fenced).toEqual({ a: 1 });
    expect(plain).toEqual({ a: 1 });
  });

  it('parses fences written with carriage returns', () => {
    expect(parseModelResponse('```json\r{"a":1}\r```')).toEqual({ a: 1 });
  });

  it('reads integers beyond 2^53 as the nearest double', () => {
    const result = parseModelResponse('{"receipt": 12345678901234567891}');

    expect(result).toEqual({ receipt: 12345678901234567000 });
    expect(parseModelResponse('{"receipt": "12345678901234567891"}')).toEqual({
      receipt: '12345678901234567891',
    });
  });

  it('returns non-object JSON verbatim', () => {
    expect(parseModelResponse('[1, "two", null]')).toEqual([1, 'two', null]);
  });

  it.each(['', '   ', '```json\n```'])('rejects empty output %j', (text) => {
    expect(() => parseModelResponse(text)).toThrow(EmptyModelResponseError);
  });

  it('rejects malformed JSON with a diagnostic', () => {
    let caught: unknown;
    try {
      parseModelResponse('{invalid');
    } catch (error) {
      caught = error;
    }

    expect(caught).toBeInstanceOf(MalformedModelJsonError);
    if (caught instanceof MalformedModelJsonError) {
      expect(caught.kind).toBe('MalformedModelJSON');
      expect(caught.diagnostic.length).toBeGreaterThan(0);
      expect(caught.snippet).toBe('{invalid');
      expect(caught.message.startsWith('Model output was not valid JSON: ')).toBe(true);
    }
  });

  it('keeps only the first 500 characters of the offending text', () => {
    const text = `{"a": "${'x'.repeat(700)}`;

    try {
      parseModelResponse(text);
      expect.unreachable();
    } catch (error) {
      expect(error).toBeInstanceOf(MalformedModelJsonError);
      if (error instanceof MalformedModelJsonError) {
        expect(error.snippet).toHaveLength(MALFORMED_SNIPPET_LENGTH);
        expect(error.snippet).toBe(text.slice(0, 500));
      }
    }
  });
});
