/**
 * Zeroable holder for a credential value.
 *
 * The bytes live in a Buffer that dispose() overwrites with zeros. String
 * conversions and inspection print a mask, so a stray log call cannot leak
 * the value.
 */

import { inspect } from "node:util";

const MASK = "[secret]";

export class SecretValue {
  private readonly bytes: Buffer;
  private disposed = false;

  constructor(value: string) {
    this.bytes = Buffer.alloc(Buffer.byteLength(value, "utf-8"));
    this.bytes.write(value, "utf-8");
  }

  get byteLength(): number {
    return this.bytes.length;
  }

  get isDisposed(): boolean {
    return this.disposed;
  }

  /**
   * The plain value. Keep the returned string's lifetime as short as possible.
   */
  reveal(): string {
    if (this.disposed) {
      throw new Error("Secret value has already been cleared");
    }
    return this.bytes.toString("utf-8");
  }

  dispose(): void {
    this.bytes.fill(0);
    this.disposed = true;
  }

  toString(): string {
    return MASK;
  }

  toJSON(): string {
    return MASK;
  }

  [inspect.custom](): string {
    return MASK;
  }
}
