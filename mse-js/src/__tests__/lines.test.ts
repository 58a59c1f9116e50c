/**
 * Line decoding and classification tests.
 */

import { describe, it } from 'node:test';
import assert from 'node:assert/strict';
import {
  ByteInput,
  LineDecoder,
  eatUtf8Bom,
  classifyLine,
  isBlankLine,
  canonicalName,
  DecodeError,
  MessageQueue,
  Reader,
} from '../index.js';

function decoder(bytes: string | number[]): LineDecoder {
  const data = typeof bytes === 'string' ? Buffer.from(bytes, 'utf8') : Uint8Array.from(bytes);
  return new LineDecoder(new ByteInput(data));
}

function readAll(lines: LineDecoder): string[] {
  const out: string[] = [];
  let line = lines.readLine();
  while (line !== null) {
    out.push(line);
    line = lines.readLine();
  }
  return out;
}

// ================================================================
// ByteInput
// ================================================================

describe('ByteInput', () => {
  it('returns bytes in order, then -1', () => {
    const input = new ByteInput(Uint8Array.from([1, 2]));
    assert.equal(input.getc(), 1);
    assert.equal(input.getc(), 2);
    assert.equal(input.eof(), false);
    assert.equal(input.getc(), -1);
    assert.equal(input.eof(), true);
  });

  it('returns pushed back bytes first', () => {
    const input = new ByteInput(Uint8Array.from([1]));
    assert.equal(input.getc(), 1);
    assert.equal(input.getc(), -1);
    input.ungetc(7);
    assert.equal(input.eof(), false);
    assert.equal(input.getc(), 7);
    assert.equal(input.getc(), -1);
  });
});

// ================================================================
// Byte order mark
// ================================================================

describe('eatUtf8Bom', () => {
  it('drops a byte order mark', () => {
    const input = new ByteInput(Uint8Array.from([0xef, 0xbb, 0xbf, 0x61]));
    assert.equal(eatUtf8Bom(input), true);
    assert.equal(input.getc(), 0x61);
  });

  it('leaves other input untouched', () => {
    const input = new ByteInput(Uint8Array.from([0x61, 0x62]));
    assert.equal(eatUtf8Bom(input), false);
    assert.equal(input.getc(), 0x61);
    assert.equal(input.getc(), 0x62);
  });

  it('pushes back every byte of a partial mark', () => {
    const input = new ByteInput(Uint8Array.from([0xef, 0xbb, 0x41]));
    assert.equal(eatUtf8Bom(input), false);
    assert.equal(input.getc(), 0xef);
    assert.equal(input.getc(), 0xbb);
    assert.equal(input.getc(), 0x41);
    assert.equal(input.getc(), -1);
  });
});

// ================================================================
// LineDecoder
// ================================================================

describe('LineDecoder', () => {
  it('splits on LF, CRLF and lone CR', () => {
    assert.deepEqual(readAll(decoder('a\nb\r\nc\rd')), ['a', 'b', 'c', 'd']);
  });

  it('does not report an extra line after a final terminator', () => {
    assert.deepEqual(readAll(decoder('x\n')), ['x']);
    assert.deepEqual(readAll(decoder('x\r')), ['x']);
  });

  it('reports empty lines', () => {
    assert.deepEqual(readAll(decoder('\n\na')), ['', '', 'a']);
  });

  it('returns null for empty input', () => {
    assert.equal(decoder('').readLine(), null);
  });

  it('reads to the end of the stream when asked', () => {
    assert.equal(decoder('a\nb\r\nc').readLine(true), 'a\nb\r\nc');
  });

  it('decodes multi-byte characters', () => {
    assert.deepEqual(readAll(decoder('héllo ✓\nnaïve')), ['héllo ✓', 'naïve']);
  });

  it('handles lines longer than its initial buffer', () => {
    const long = 'x'.repeat(3000);
    assert.deepEqual(readAll(decoder(`${long}\nshort`)), [long, 'short']);
  });

  it('rejects invalid UTF-8', () => {
    const lines = decoder([0x61, 0xff, 0x0a]);
    assert.throws(() => lines.readLine(), DecodeError);
  });
});

// ================================================================
// classifyLine
// ================================================================

describe('classifyLine', () => {
  it('splits indent, key and value', () => {
    assert.deepEqual(classifyLine('\t\tkey: value'), { indent: 2, key: 'key', value: 'value', anomalies: [] });
  });

  it('treats blank lines as having no key', () => {
    assert.deepEqual(classifyLine('  \t '), { indent: 0, key: '', value: '', anomalies: [] });
  });

  it('treats comments as having no key', () => {
    assert.deepEqual(classifyLine('\t# a: b'), { indent: 1, key: '', value: '', anomalies: [] });
  });

  it('trims only the start of the value', () => {
    assert.equal(classifyLine('a:   b c ').value, 'b c ');
  });

  it('splits at the first colon', () => {
    const line = classifyLine('url: http://example.com');
    assert.equal(line.key, 'url');
    assert.equal(line.value, 'http://example.com');
  });

  it('canonicalizes keys', () => {
    assert.equal(classifyLine('Card Style: x').key, 'card_style');
  });

  it('reports a missing separator', () => {
    assert.deepEqual(classifyLine('\tjust text'), {
      indent: 1,
      key: 'just_text',
      value: '',
      anomalies: [{ kind: 'missing-separator', message: "Missing ':'" }],
    });
  });

  it('uses a placeholder key for an empty name before a colon', () => {
    const line = classifyLine(':value');
    assert.equal(line.key, ' ');
    assert.equal(line.value, 'value');
  });

  it('turns 8 leading spaces into one indent level', () => {
    const spaced = classifyLine('        foo: 1');
    const tabbed = classifyLine('\tfoo: 1');
    assert.equal(spaced.indent, tabbed.indent);
    assert.equal(spaced.key, tabbed.key);
    assert.equal(spaced.value, tabbed.value);
    assert.deepEqual(spaced.anomalies, [
      {
        kind: 'space-indentation',
        message: "key: '        foo' starts with a space; only use TABs for indentation!",
      },
    ]);
  });

  it('adds repaired spaces to the tab indent', () => {
    const line = classifyLine('\t                bar: 2');
    assert.equal(line.indent, 3);
    assert.equal(line.key, 'bar');
  });

  it('does not count fewer than 8 spaces as a level', () => {
    const line = classifyLine('    baz: 1');
    assert.equal(line.indent, 0);
    assert.equal(line.key, 'baz');
    assert.equal(line.anomalies.length, 1);
  });

  it('leaves space indentation alone in lenient mode', () => {
    assert.deepEqual(classifyLine('        foo: 1', false, true), {
      indent: 0,
      key: 'foo',
      value: '1',
      anomalies: [],
    });
  });

  it('does not take other whitespace for a blank line', () => {
    assert.equal(isBlankLine(' \t '), true);
    assert.equal(isBlankLine('\u00a0'), false);
    assert.deepEqual(classifyLine('\u3000').anomalies, [{ kind: 'missing-separator', message: "Missing ':'" }]);
  });

  it('takes text block lines as they are', () => {
    assert.deepEqual(classifyLine('        just text', true), {
      indent: 0,
      key: 'just_text',
      value: '',
      anomalies: [],
    });
  });
});

describe('canonicalName', () => {
  it('lower-cases and joins words with underscores', () => {
    assert.equal(canonicalName('Card Style'), 'card_style');
    assert.equal(canonicalName('card  style'), 'card_style');
    assert.equal(canonicalName('mse_version'), 'mse_version');
  });
});

// ================================================================
// Line endings through the Reader
// ================================================================

describe('Reader line endings', () => {
  it('reads CRLF and CR documents like LF ones', () => {
    const reader = new Reader('mse_version: 1.0.0\r\ntitle: A\rcount: 2\r\n', { messages: new MessageQueue() });
    assert.equal(reader.fileAppVersion.toString(), '1.0.0');
    assert.equal(reader.handleField('title', 'text', ''), 'A');
    assert.equal(reader.handleField('count', 'int', 0), 2);
    assert.deepEqual(reader.warnings, []);
  });
});
