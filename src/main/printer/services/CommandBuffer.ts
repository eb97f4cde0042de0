/**
 * Command Buffer
 *
 * Append-only ordered sequence of encoded tokens. Encoders append to it
 * and finalize it on demand; the buffer itself never rejects, reorders
 * or deduplicates anything.
 *
 * @module printer/services/CommandBuffer
 */

/**
 * Base buffer: holds tokens in issuance order and finalizes them
 * into the protocol's terminal representation.
 */
export abstract class CommandBuffer<TToken, TOutput> {
  protected tokens: TToken[] = [];

  /**
   * Add a token to the end of the sequence
   */
  append(token: TToken): this {
    this.tokens.push(token);
    return this;
  }

  /**
   * Number of tokens appended since the last clear
   */
  get length(): number {
    return this.tokens.length;
  }

  isEmpty(): boolean {
    return this.tokens.length === 0;
  }

  /**
   * Read-only view of the tokens in issuance order
   */
  get items(): readonly TToken[] {
    return this.tokens;
  }

  /**
   * Empty the sequence. The buffer instance stays usable.
   */
  clear(): void {
    this.tokens = [];
  }

  /**
   * Produce the terminal representation. Pure: repeated calls
   * return equal output and leave the buffer untouched.
   */
  abstract finalize(): TOutput;
}

// ============================================================================
// Binary buffer
// ============================================================================

/**
 * Byte-token buffer for the binary receipt protocol
 */
export class ByteCommandBuffer extends CommandBuffer<readonly number[], Buffer> {
  /**
   * Total number of bytes appended
   */
  get byteLength(): number {
    let total = 0;
    for (const token of this.tokens) {
      total += token.length;
    }
    return total;
  }

  finalize(): Buffer {
    const bytes = new Uint8Array(this.byteLength);
    let offset = 0;
    for (const token of this.tokens) {
      bytes.set(token, offset);
      offset += token.length;
    }
    return Buffer.from(bytes);
  }
}

// ============================================================================
// Statement buffer
// ============================================================================

/**
 * How rendered statements are joined into the final text.
 * - line: every statement followed by CRLF
 * - field: statements concatenated directly
 */
export type StatementFraming = 'line' | 'field';

export const LINE_TERMINATOR = '\r\n';

/**
 * Text-statement buffer for the line and field protocols.
 * Statements stay structured until finalize() renders them.
 */
export class StatementBuffer<S> extends CommandBuffer<S, string> {
  constructor(
    private readonly render: (statement: S) => string,
    private readonly framing: StatementFraming
  ) {
    super();
  }

  finalize(): string {
    const rendered = this.tokens.map(this.render);
    if (this.framing === 'line') {
      return rendered.map((line) => line + LINE_TERMINATOR).join('');
    }
    return rendered.join('');
  }
}
