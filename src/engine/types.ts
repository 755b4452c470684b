/* ------------------------------------------------- */
/* File: src/engine/types.ts                         */
/* ------------------------------------------------- */
export const DIRECTIONS = ["up", "down", "left", "right"] as const;
export type Direction = (typeof DIRECTIONS)[number];

export const ORIENTATIONS = ["horizontal", "vertical"] as const;
export type Orientation = (typeof ORIENTATIONS)[number];

export const SHIP_TYPES = ["Battleship", "Cruiser", "Destroyer", "Submarine"] as const;
export type ShipType = (typeof SHIP_TYPES)[number];

export interface Position {
  x: number;
  y: number;
}

/** hidden = jamais visée */
export type CellState = "hidden" | "hit" | "miss";

export type Grid = CellState[][];

export interface ShipPlacement {
  id: number;
  type: ShipType;
  x: number;
  y: number;
  orientation: Orientation;
}

export interface StrikeReport {
  hit: boolean;
  sunk: boolean;
  fleetDestroyed: boolean;
}

export type Logger = Pick<Console, "log" | "warn" | "error">;
