/**
 * Tests for the byte and statement command buffers
 */

import * as fc from 'fast-check';
import './propertyTestConfig';
import {
  ByteCommandBuffer,
  LINE_TERMINATOR,
  StatementBuffer,
} from '../main/printer/services/CommandBuffer';

const identity = (statement: string): string => statement;

describe('ByteCommandBuffer', () => {
  it('concatenates tokens in append order', () => {
    const buffer = new ByteCommandBuffer().append([0x1b, 0x40]).append([0x0a]);

    expect(buffer.length).toBe(2);
    expect(buffer.byteLength).toBe(3);
    expect(Array.from(buffer.finalize())).toEqual([0x1b, 0x40, 0x0a]);
  });

  it('finalizes to an empty buffer after clear and stays usable', () => {
    const buffer = new ByteCommandBuffer().append([1, 2, 3]);
    buffer.clear();

    expect(buffer.isEmpty()).toBe(true);
    expect(buffer.finalize().length).toBe(0);

    buffer.append([9]);
    expect(Array.from(buffer.finalize())).toEqual([9]);
  });

  it('finalize is a pure read', () => {
    fc.assert(
      fc.property(
        fc.array(fc.array(fc.integer({ min: 0, max: 255 }), { maxLength: 8 }), { maxLength: 20 }),
        (tokens) => {
          const buffer = new ByteCommandBuffer();
          tokens.forEach((token) => buffer.append(token));

          const first = buffer.finalize();
          const second = buffer.finalize();

          expect(first.equals(second)).toBe(true);
          expect(first.length).toBe(tokens.reduce((sum, token) => sum + token.length, 0));
          expect(buffer.length).toBe(tokens.length);
        }
      )
    );
  });
});

describe('StatementBuffer', () => {
  it('terminates every statement with CRLF under line framing', () => {
    const buffer = new StatementBuffer(identity, 'line').append('CLS').append('PRINT 1, 1');

    expect(buffer.finalize()).toBe('CLS\r\nPRINT 1, 1\r\n');
  });

  it('finalizes an empty line buffer to an empty string', () => {
    expect(new StatementBuffer(identity, 'line').finalize()).toBe('');
  });

  it('concatenates statements under field framing', () => {
    const buffer = new StatementBuffer(identity, 'field').append('^XA').append('^XZ');

    expect(buffer.finalize()).toBe('^XA^XZ');
  });

  it('renders statements only when finalized', () => {
    const render = jest.fn((statement: { code: string }) => statement.code);
    const buffer = new StatementBuffer(render, 'field').append({ code: '^XA' });

    expect(render).not.toHaveBeenCalled();
    expect(buffer.finalize()).toBe('^XA');
    expect(render).toHaveBeenCalledTimes(1);
  });

  it('line output has one terminator per statement', () => {
    fc.assert(
      fc.property(fc.array(fc.stringMatching(/^[A-Z ]{1,10}$/), { maxLength: 20 }), (lines) => {
        const buffer = new StatementBuffer(identity, 'line');
        lines.forEach((line) => buffer.append(line));

        const text = buffer.finalize();
        expect(text.split(LINE_TERMINATOR).length - 1).toBe(lines.length);
        expect(buffer.finalize()).toBe(text);
      })
    );
  });
});
