import type { DocLabel, Token, TokenAttrs, TokenAttrValue } from "../types.js";
import type { TokenDocument } from "../document.js";
import { ShapeError, invalidArgument } from "../errors.js";

export interface MaskedTokenDocumentInit {
  /** Defaults to all-true. */
  mask?: Iterable<boolean>;
  attrs?: TokenAttrs;
}

/**
 * Token buffer + boolean mask.
 *
 * Data structure:
 * - `tokens[i]` is live iff `mask[i]`
 * - attributes are buffer-aligned arrays keyed by name
 *
 * The live count is tracked on every mask update so `length` is O(1).
 */
export class MaskedTokenDocument implements TokenDocument {
  readonly label: DocLabel;

  private readonly buf: Token[];
  private readonly bits: boolean[];
  private readonly attrMap = new Map<string, TokenAttrValue[]>();
  private live: number;

  constructor(label: DocLabel, tokens: Iterable<Token>, init?: MaskedTokenDocumentInit) {
    this.label = label;
    this.buf = Array.from(tokens);
    this.bits = init?.mask ? Array.from(init.mask) : new Array<boolean>(this.buf.length).fill(true);

    if (this.bits.length !== this.buf.length) {
      throw new ShapeError(`mask of document "${label}" must have ${this.buf.length} entries`, {
        label,
        expected: this.buf.length,
        actual: this.bits.length,
      });
    }

    for (const [name, values] of Object.entries(init?.attrs ?? {})) {
      if (values.length !== this.buf.length) {
        throw new ShapeError(`attribute "${name}" of document "${label}" must have ${this.buf.length} entries`, {
          label,
          attr: name,
          expected: this.buf.length,
          actual: values.length,
        });
      }
      this.attrMap.set(name, Array.from(values));
    }

    this.live = countTrue(this.bits);
  }

  get tokens(): readonly Token[] {
    return this.buf;
  }

  get mask(): readonly boolean[] {
    return this.bits;
  }

  get length(): number {
    return this.live;
  }

  get bufferLength(): number {
    return this.buf.length;
  }

  attrNames(): string[] {
    return Array.from(this.attrMap.keys());
  }

  hasAttr(name: string): boolean {
    return this.attrMap.has(name);
  }

  attr(name: string): readonly TokenAttrValue[] | undefined {
    return this.attrMap.get(name);
  }

  logicalTokens(): Token[] {
    return this.pick(this.buf);
  }

  logicalAttr(name: string): TokenAttrValue[] {
    const values = this.attrMap.get(name);
    if (!values) {
      throw invalidArgument(`document "${this.label}" has no token attribute "${name}"`, { label: this.label, attr: name });
    }
    return this.pick(values);
  }

  isCompact(): boolean {
    return this.live === this.buf.length;
  }

  applyMask(submask: readonly boolean[], invert: boolean = false): void {
    if (submask.length !== this.live) {
      throw new ShapeError(`mask for document "${this.label}" must have ${this.live} entries (one per live token)`, {
        label: this.label,
        expected: this.live,
        actual: submask.length,
      });
    }

    let j = 0;
    let live = 0;
    for (let i = 0; i < this.bits.length; i++) {
      if (!this.bits[i]) continue;
      const keep = invert ? !submask[j] : !!submask[j];
      j++;
      this.bits[i] = keep;
      if (keep) live++;
    }
    this.live = live;
  }

  compact(): TokenDocument {
    if (this.isCompact()) return this;

    const attrs: Record<string, TokenAttrValue[]> = {};
    for (const [name, values] of this.attrMap) attrs[name] = this.pick(values);

    return new MaskedTokenDocument(this.label, this.logicalTokens(), { attrs });
  }

  mapTokens(fn: (token: Token) => Token): TokenDocument {
    const tokens = this.buf.map((t, i) => (this.bits[i] ? fn(t) : t));
    return new MaskedTokenDocument(this.label, tokens, { mask: this.bits, attrs: this.attrsRecord() });
  }

  private attrsRecord(): TokenAttrs {
    return Object.fromEntries(this.attrMap);
  }

  private pick<T>(values: readonly T[]): T[] {
    const out: T[] = [];
    for (let i = 0; i < values.length; i++) {
      if (this.bits[i]) out.push(values[i]!);
    }
    return out;
  }
}

function countTrue(bits: readonly boolean[]): number {
  let n = 0;
  for (const b of bits) if (b) n++;
  return n;
}
