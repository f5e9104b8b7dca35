/**
 * Array literal scanning state machine.
 *
 * Callers call reset() and then feed bytes one at a time through step().
 * The returned opcode reports significant parsing events (beginning of a
 * literal, opening and closing of arrays) so the caller can follow along.
 *
 * Op.End means the top-level value completed *before* the byte just passed
 * in. The delay is needed to find the end of a bare literal: `12` is only
 * known to be whole once the next `,`, `}` or end of input is seen.
 */

import { Char, Op, ScanState } from "./constants.ts";
import { ArraySyntaxError, ScannerMisuseError, quoteChar } from "./errors.ts";

export class Scanner {
  private state: ScanState = ScanState.BeginValue;
  /** One entry per open `{`. */
  private nesting = 0;
  private endTop = false;
  private err: ArraySyntaxError | null = null;

  // 1-byte redo, see undo()
  private redo = false;
  private redoCode: Op = Op.Continue;
  private redoState: ScanState = ScanState.BeginValue;

  /** Bytes consumed since reset(). */
  bytes = 0;

  /** Prepare for a new top-level value. Must be called before step(). */
  reset(): void {
    this.state = ScanState.BeginValue;
    this.nesting = 0;
    this.endTop = false;
    this.err = null;
    this.redo = false;
    this.bytes = 0;
  }

  get error(): ArraySyntaxError | null {
    return this.err;
  }

  /** Current array nesting depth. */
  get depth(): number {
    return this.nesting;
  }

  step(c: number): Op {
    if (this.state === ScanState.Redo) {
      return this.stateRedo();
    }
    this.bytes++;
    return this.dispatch(c);
  }

  /** Signal that the input is exhausted. */
  endOfInput(): Op {
    if (this.err !== null) return Op.Error;
    if (this.endTop) return Op.End;
    if (this.state === ScanState.Redo) this.stateRedo();

    // A bare literal at the top level is terminated by the end of input.
    if (this.state === ScanState.InBare && this.nesting === 0) {
      this.state = ScanState.EndTop;
      this.endTop = true;
      return Op.End;
    }
    if (this.state !== ScanState.InBare) {
      this.dispatch(Char.SPACE);
      if (this.endTop) return Op.End;
    }
    if (this.err === null) {
      this.err = new ArraySyntaxError("unexpected end of input", this.bytes, null, "end of input");
      this.state = ScanState.Error;
    }
    return Op.Error;
  }

  /**
   * Make the next step() return `op` and resume from the current state.
   * Only one level of undo is supported.
   */
  undo(op: Op): void {
    if (this.redo) {
      throw new ScannerMisuseError("invalid use of scanner: undo while an undo is pending");
    }
    this.redoCode = op;
    this.redoState = this.state;
    this.state = ScanState.Redo;
    this.redo = true;
  }

  private dispatch(c: number): Op {
    switch (this.state) {
      case ScanState.BeginValue:
        return this.stateBeginValue(c);
      case ScanState.BeginValueOrEmpty:
        return this.stateBeginValueOrEmpty(c);
      case ScanState.EndValue:
        return this.stateEndValue(c);
      case ScanState.EndTop:
        return this.stateEndTop(c);
      case ScanState.InString:
        return this.stateInString(c);
      case ScanState.InStringEsc:
        this.state = ScanState.InString;
        return Op.Continue;
      case ScanState.InBare:
        return this.stateInBare(c);
      case ScanState.Error:
        return Op.Error;
      case ScanState.Redo:
        return this.stateRedo();
    }
  }

  private stateBeginValueOrEmpty(c: number): Op {
    if (c === Char.SPACE) return Op.SkipSpace;
    if (c === Char.CLOSE_BRACE) return this.stateEndValue(c);
    return this.stateBeginValue(c);
  }

  private stateBeginValue(c: number): Op {
    if (c === Char.SPACE) return Op.SkipSpace;
    if (c === Char.OPEN_BRACE) {
      this.state = ScanState.BeginValueOrEmpty;
      this.nesting++;
      return Op.BeginArray;
    }
    if (c === Char.QUOTE) {
      this.state = ScanState.InString;
      return Op.BeginLiteral;
    }
    if (c < Char.FIRST_PRINTABLE || c === Char.COMMA || c === Char.CLOSE_BRACE) {
      return this.fail(c, "looking for beginning of value");
    }
    // Unquoted value; a string when decoding into a string destination.
    this.state = ScanState.InBare;
    return Op.BeginLiteral;
  }

  private stateEndValue(c: number): Op {
    if (this.nesting === 0) {
      // Completed top-level before the current byte.
      this.state = ScanState.EndTop;
      this.endTop = true;
      return this.stateEndTop(c);
    }
    if (c === Char.SPACE) {
      this.state = ScanState.EndValue;
      return Op.SkipSpace;
    }
    if (c === Char.COMMA) {
      this.state = ScanState.BeginValue;
      return Op.ArrayValue;
    }
    if (c === Char.CLOSE_BRACE) {
      this.popNesting();
      return Op.EndArray;
    }
    return this.fail(c, "after array element");
  }

  private stateEndTop(c: number): Op {
    if (c !== Char.SPACE) {
      return this.fail(c, "after top-level value");
    }
    return Op.End;
  }

  private stateInString(c: number): Op {
    if (c === Char.QUOTE) {
      this.state = ScanState.EndValue;
      return Op.Continue;
    }
    if (c === Char.BACKSLASH) {
      this.state = ScanState.InStringEsc;
      return Op.Continue;
    }
    if (c < Char.FIRST_PRINTABLE) {
      return this.fail(c, "in string literal");
    }
    return Op.Continue;
  }

  private stateInBare(c: number): Op {
    // The delimiter is not consumed: the caller needs to see it again.
    if (c === Char.COMMA || c === Char.CLOSE_BRACE) {
      return this.stateEndValue(c);
    }
    // A top-level bare literal ends at the first space; inside arrays spaces are data.
    if (c === Char.SPACE && this.nesting === 0) {
      return this.stateEndValue(c);
    }
    if (c < Char.FIRST_PRINTABLE) {
      return this.fail(c, "in string literal");
    }
    return Op.Continue;
  }

  private stateRedo(): Op {
    this.redo = false;
    this.state = this.redoState;
    return this.redoCode;
  }

  private popNesting(): void {
    this.nesting--;
    this.redo = false;
    if (this.nesting === 0) {
      this.state = ScanState.EndTop;
      this.endTop = true;
    } else {
      this.state = ScanState.EndValue;
    }
  }

  private fail(c: number, context: string): Op {
    this.state = ScanState.Error;
    this.err = new ArraySyntaxError(
      `invalid character ${quoteChar(c)} ${context}`,
      this.bytes,
      c,
      context,
    );
    return Op.Error;
  }
}
