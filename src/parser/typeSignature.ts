/**
 * Structural parsing of declared field types.
 *
 * Handles the shapes that appear in account structs: paths with optional
 * generic arguments, where arguments are lifetimes or nested types. Anything
 * else (references, tuples, arrays, trait objects) parses to null.
 */

import type { TypeSignature } from "../types/index.js";

const WRAPPERS = new Set(["Box", "Option"]);

const ACCOUNT_WRAPPERS = new Set(["Account", "InterfaceAccount", "AccountLoader"]);

export type RawHandleKind = "AccountInfo" | "UncheckedAccount";

class TypeParser {
  private pos = 0;

  constructor(private readonly text: string) {}

  atEnd(): boolean {
    this.skipWhitespace();
    return this.pos >= this.text.length;
  }

  parseType(): TypeSignature | null {
    this.skipWhitespace();
    const path: string[] = [];

    if (this.text.startsWith("::", this.pos)) {
      this.pos += 2;
    }

    for (;;) {
      const ident = this.parseIdent();
      if (ident === null) return null;
      path.push(ident);
      this.skipWhitespace();
      if (!this.text.startsWith("::", this.pos)) break;
      this.pos += 2;
      this.skipWhitespace();
    }

    const lifetimes: string[] = [];
    const args: TypeSignature[] = [];

    if (this.peek() === "<") {
      this.pos++;
      for (;;) {
        this.skipWhitespace();
        if (this.peek() === ">") {
          this.pos++;
          break;
        }

        if (this.peek() === "'") {
          this.pos++;
          const lifetime = this.parseIdent();
          if (lifetime === null) return null;
          lifetimes.push(lifetime);
        } else {
          const arg = this.parseType();
          if (arg === null) return null;
          args.push(arg);
        }

        this.skipWhitespace();
        const next = this.peek();
        if (next === ",") {
          this.pos++;
        } else if (next !== ">") {
          return null;
        }
      }
    }

    const name = path[path.length - 1];
    if (name === undefined) return null;

    return { name, path, lifetimes, args };
  }

  private parseIdent(): string | null {
    const match = /[A-Za-z_]\w*/y;
    match.lastIndex = this.pos;
    const found = match.exec(this.text);
    if (!found) return null;
    this.pos += found[0].length;
    return found[0];
  }

  private peek(): string {
    return this.text.charAt(this.pos);
  }

  private skipWhitespace(): void {
    while (/\s/.test(this.text.charAt(this.pos))) {
      this.pos++;
    }
  }
}

/**
 * Parse a declared type such as `Box<Account<'info, Vault>>`.
 *
 * @returns null for empty or unsupported type text
 */
export function parseTypeSignature(text: string): TypeSignature | null {
  if (text.trim() === "") return null;
  const parser = new TypeParser(text);
  const signature = parser.parseType();
  if (signature === null || !parser.atEnd()) return null;
  return signature;
}

/**
 * Strip `Box<...>` and `Option<...>` layers.
 */
export function unwrapType(signature: TypeSignature): TypeSignature {
  let current = signature;
  while (WRAPPERS.has(current.name) && current.args.length === 1) {
    const inner = current.args[0];
    if (inner === undefined) break;
    current = inner;
  }
  return current;
}

/**
 * Data type held by a typed account wrapper: `Vault` for
 * `Account<'info, Vault>`, `Box<InterfaceAccount<'info, Mint>>` gives `Mint`.
 */
export function elementType(signature: TypeSignature | null): string | null {
  if (signature === null) return null;
  const inner = unwrapType(signature);
  if (!ACCOUNT_WRAPPERS.has(inner.name)) return null;
  const data = inner.args[inner.args.length - 1];
  return data === undefined ? null : data.name;
}

/**
 * Which untyped account handle a field uses, if any.
 */
export function rawHandleKind(signature: TypeSignature | null): RawHandleKind | null {
  if (signature === null) return null;
  const { name } = unwrapType(signature);
  if (name === "AccountInfo" || name === "UncheckedAccount") return name;
  return null;
}

export function isSignerType(signature: TypeSignature | null): boolean {
  return signature !== null && unwrapType(signature).name === "Signer";
}
