import { type ShapeRandomGenerator } from "./interface";
import { type Shape } from "../types";

// What follows the last scripted shape
export type SequenceEnd = "repeat" | "holdLast";

/**
 * Replays a scripted list of shapes, for tests and recorded games. Past the
 * end it either starts over or keeps yielding the final shape.
 */
export class SequenceRng implements ShapeRandomGenerator {
  constructor(
    private readonly script: ReadonlyArray<Shape>,
    private readonly position = 0,
    private readonly end: SequenceEnd = "repeat",
  ) {
    if (script.length === 0) throw new Error("Sequence must not be empty");
    if (
      !Number.isInteger(position) ||
      position < 0 ||
      position >= script.length
    ) {
      throw new Error(`Sequence position out of range: ${String(position)}`);
    }
  }

  getNextShape(): { shape: Shape; newRng: ShapeRandomGenerator } {
    const shape = this.script[this.position];
    if (shape === undefined) {
      throw new Error(`Sequence position out of range: ${String(this.position)}`);
    }

    const atLast = this.position === this.script.length - 1;
    if (atLast && this.end === "holdLast") return { newRng: this, shape };

    const next = atLast ? 0 : this.position + 1;
    return { newRng: new SequenceRng(this.script, next, this.end), shape };
  }
}
