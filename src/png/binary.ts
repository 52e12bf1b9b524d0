// src/png/binary.ts

/** Big-endian cursor over a PNG buffer. Reads return views, not copies. */
export class BinaryReader {
  private offset: number;

  public constructor(private readonly buf: Buffer, start = 0) {
    this.offset = start;
  }

  public position(): number {
    return this.offset;
  }

  public remaining(): number {
    return this.buf.length - this.offset;
  }

  public readU32BE(): number {
    return this.take(4).readUInt32BE(0);
  }

  /** Chunk type tags are four Latin-1 bytes. */
  public readTag4(): string {
    return this.take(4).toString("latin1");
  }

  public readBytes(n: number): Buffer {
    if (!Number.isInteger(n) || n < 0) throw new Error(`Invalid read length: ${n}`);
    return this.take(n);
  }

  public skip(n: number): void {
    this.readBytes(n);
  }

  private take(n: number): Buffer {
    if (this.offset + n > this.buf.length) {
      throw new Error(`Unexpected EOF at ${this.offset}: need ${n} bytes, have ${this.remaining()}`);
    }
    const out = this.buf.subarray(this.offset, this.offset + n);
    this.offset += n;
    return out;
  }
}

export class BinaryWriter {
  private readonly parts: Buffer[] = [];

  public writeU8(v: number): void {
    if (!Number.isInteger(v) || v < 0 || v > 0xff) throw new Error(`U8 out of range: ${v}`);
    this.parts.push(Buffer.of(v));
  }

  public writeU32BE(v: number): void {
    if (!Number.isInteger(v) || v < 0 || v > 0xffffffff) throw new Error(`U32 out of range: ${v}`);
    const b = Buffer.alloc(4);
    b.writeUInt32BE(v, 0);
    this.parts.push(b);
  }

  public writeTag4(tag: string): void {
    if (tag.length !== 4) throw new Error(`Tag must be 4 chars: '${tag}'`);
    if (!/^[\x21-\x7e]{4}$/.test(tag)) throw new Error(`Tag must be 4 bytes ASCII: '${tag}'`);
    this.parts.push(Buffer.from(tag, "latin1"));
  }

  public writeBytes(bytes: Uint8Array): void {
    this.parts.push(Buffer.from(bytes));
  }

  /** Writes `text` followed by a NUL terminator. */
  public writeCString(text: string, encoding: "latin1" | "utf8" = "latin1"): void {
    if (text.includes("\0")) throw new Error("C string must not contain NUL");
    this.parts.push(Buffer.from(text, encoding), Buffer.alloc(1));
  }

  public toBuffer(): Buffer {
    return Buffer.concat(this.parts);
  }
}
