import type { Cell, Rotation, Tick } from "./core/types";

export type MatchEvent =
  | { kind: "PieceSpawned"; shapeId: string; x: number; y: number; tick: Tick }
  | { kind: "MovedLeft"; fromX: number; toX: number; tick: Tick }
  | { kind: "MovedRight"; fromX: number; toX: number; tick: Tick }
  | {
      kind: "MovedDown";
      source: "gravity" | "softDrop";
      fromY: number;
      toY: number;
      tick: Tick;
    }
  | { kind: "Rotated"; rotation: Rotation; tick: Tick }
  | {
      kind: "Locked";
      shapeId: string;
      cells: ReadonlyArray<Cell>;
      tick: Tick;
    }
  | { kind: "LinesCleared"; rows: ReadonlyArray<number>; tick: Tick }
  | { kind: "TopOut"; reason: "stack" | "spawnBlocked"; tick: Tick };

export type MatchEventKind = MatchEvent["kind"];
