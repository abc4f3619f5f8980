import { type ShapeRandomGenerator } from "./interface";
import { type Shape } from "../types";

// Always returns the same shape
export class OneShapeRng implements ShapeRandomGenerator {
  constructor(private readonly shape: Shape) {}

  getNextShape(): { shape: Shape; newRng: ShapeRandomGenerator } {
    return { newRng: this, shape: this.shape };
  }
}
