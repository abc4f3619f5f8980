export * from "./core/types";
export {
  countOccupied,
  createGrid,
  eliminateFullRows,
  getCell,
  getFullRows,
  gridRows,
  isRowFull,
  isRowOccupied,
  setCell,
  stampCells,
} from "./core/grid";
export {
  bottomRow,
  createPiece,
  hasCollision,
  nextRotation,
  rotateOffset,
  tryOffset,
  tryRotate,
  worldCells,
  type MoveResult,
} from "./core/piece";
export {
  ALL_TETROMINOES,
  TETROMINOES,
  createShape,
  type TetrominoId,
} from "./core/shapes";
export { type ShapeRandomGenerator } from "./core/rng/interface";
export { createUniformRng } from "./core/rng/seeded";
export { SequenceRng, type SequenceEnd } from "./core/rng/sequence";
export { OneShapeRng } from "./core/rng/one-piece";
export {
  DEFAULT_MATCH_CONFIG,
  createMatchConfig,
  topOutRow,
  type MatchConfig,
} from "./config";
export { NO_INPUT, createInput, type InputIntents } from "./input";
export { type MatchEvent, type MatchEventKind } from "./events";
export { type MatchContext } from "./match/context";
export { type MatchState } from "./match/machine";
export { MatchService, type MatchOptions } from "./match/service";
