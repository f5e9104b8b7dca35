/**
 * Byte cursor over one array literal, paired with its scanner.
 */

import { Op } from "./constants.ts";
import { ScannerMisuseError } from "./errors.ts";
import { Scanner } from "./scanner.ts";

export class LiteralReader {
  readonly buffer: Uint8Array;
  readonly scanner: Scanner;
  /** Read offset. Set to length + 1 once end of input has been signalled. */
  offset = 0;
  private pendingUnread = false;

  constructor(buffer: Uint8Array, scanner: Scanner = new Scanner()) {
    this.buffer = buffer;
    this.scanner = scanner;
    this.scanner.reset();
  }

  get length(): number {
    return this.buffer.length;
  }

  get atEnd(): boolean {
    return this.offset >= this.buffer.length;
  }

  /**
   * Feed bytes to the scanner until it returns something other than `op`.
   */
  scanWhile(op: Op): Op {
    let next: Op;
    do {
      next = this.next();
    } while (next === op);
    return next;
  }

  /** Step the scanner over one byte, or signal end of input. */
  next(): Op {
    this.pendingUnread = false;
    if (this.offset >= this.buffer.length) {
      // mark processed EOF with length + 1
      this.offset = this.buffer.length + 1;
      return this.scanner.endOfInput();
    }
    return this.scanner.step(this.buffer[this.offset++]);
  }

  /**
   * Back up one byte so the next scan sees it again, with the scanner
   * replaying `op` for it.
   */
  unread(op: Op): void {
    if (this.pendingUnread) {
      throw new ScannerMisuseError("invalid use of reader: unread while an unread is pending");
    }
    this.pendingUnread = true;
    this.offset--;
    this.scanner.undo(op);
  }

  /** Zero-copy view of the input. */
  slice(start: number, end: number): Uint8Array {
    return this.buffer.subarray(start, end);
  }
}
