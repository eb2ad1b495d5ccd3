/**
 * Hasher — incremental FNV-1a (32-bit) content hashing.
 *
 * Values are folded in one 32-bit word at a time. Feed the parts of a
 * structure in a fixed order and read the result with `digest()`.
 *
 * @example
 * ```typescript
 * const h = new Hasher().update(endpoints.length);
 * for (const e of endpoints) h.update(e);
 * h.digest(); // unsigned 32-bit integer
 * ```
 */

const FNV_PRIME = 16777619;
const FNV_OFFSET = 2166136261;

const INT32_MIN = -0x80000000;
const INT32_MAX = 0x7fffffff;

const floatBuffer = new ArrayBuffer(8);
const floatView = new Float64Array(floatBuffer);
const intView = new Int32Array(floatBuffer);

export class Hasher {
  private _hash = FNV_OFFSET;

  /** Fold one 32-bit word into the state. */
  private mix(word: number): void {
    this._hash ^= word;
    this._hash = Math.imul(this._hash, FNV_PRIME);
  }

  /**
   * Fold a number. 32-bit integers hash as one word, every other number
   * by its IEEE-754 bit pattern.
   */
  update(value: number): this {
    if (Number.isInteger(value) && value >= INT32_MIN && value <= INT32_MAX) {
      this.mix(value | 0);
      return this;
    }
    floatView[0] = value;
    this.mix(intView[0]);
    this.mix(intView[1]);
    return this;
  }

  /** Fold a bigint: sign, then 32-bit limbs from least significant, then limb count. */
  updateBigInt(value: bigint): this {
    const negative = value < 0n;
    let rest = negative ? -value : value;
    this.mix(negative ? 1 : 0);
    let limbs = 0;
    do {
      this.mix(Number(rest & 0xffffffffn) | 0);
      rest >>= 32n;
      limbs++;
    } while (rest > 0n);
    this.mix(limbs);
    return this;
  }

  /** Fold a string by UTF-16 code units, then its length. */
  updateString(value: string): this {
    for (let i = 0; i < value.length; i++) {
      this.mix(value.charCodeAt(i));
    }
    this.mix(value.length);
    return this;
  }

  /** The hash of everything folded so far, as an unsigned 32-bit integer. */
  digest(): number {
    return this._hash >>> 0;
  }
}
