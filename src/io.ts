// Byte sources and sinks

/** Pull side of the codec. Reads are synchronous. */
export interface ByteSource {
  /** One unsigned byte, or undefined once the input is exhausted. */
  read(): number | undefined;
  /** Up to `length` bytes; a shorter result means the input ran out. */
  readBytes(length: number): Uint8Array;
}

/** Push side of the codec. */
export interface ByteSink {
  write(byte: number): void;
  writeBytes(bytes: Uint8Array): void;
}

// --- Decoder state ---

export class ByteReader implements ByteSource {
  private readonly _db: Uint8Array;
  private _dp = 0;

  constructor(data: Uint8Array) {
    this._db = data;
  }

  get position(): number { return this._dp; }
  get remaining(): number { return this._db.length - this._dp; }

  read(): number | undefined {
    if (this._dp >= this._db.length) return undefined;
    return this._db[this._dp++];
  }

  readBytes(length: number): Uint8Array {
    const end = Math.min(this._dp + length, this._db.length);
    const b = this._db.slice(this._dp, end);
    this._dp = end;
    return b;
  }
}

// --- Encoder state ---

export class ByteWriter implements ByteSink {
  private _b: Uint8Array;
  private _p = 0;

  constructor(initialCapacity = 256) {
    this._b = new Uint8Array(Math.max(1, initialCapacity));
  }

  get length(): number { return this._p; }

  private _grow(n: number): void {
    if (this._p + n <= this._b.length) return;
    let c = this._b.length;
    while (c < this._p + n) c *= 2;
    const nb = new Uint8Array(c);
    nb.set(this._b.subarray(0, this._p));
    this._b = nb;
  }

  write(byte: number): void {
    this._grow(1);
    this._b[this._p++] = byte & 0xff;
  }

  writeBytes(bytes: Uint8Array): void {
    this._grow(bytes.length);
    this._b.set(bytes, this._p);
    this._p += bytes.length;
  }

  /** Copy of everything written so far; the writer starts over empty. */
  finish(): Uint8Array {
    const r = this._b.slice(0, this._p);
    this._p = 0;
    return r;
  }
}
