/* ------------------------------------------------- */
/* File: src/engine/movement.ts                      */
/* ------------------------------------------------- */
import { Direction, Position } from "./types.js";

export const DIRECTION_TO_DELTA: Record<Direction, { dx: number; dy: number }> = {
  up: { dx: 0, dy: -1 },
  down: { dx: 0, dy: 1 },
  left: { dx: -1, dy: 0 },
  right: { dx: 1, dy: 0 },
};

export const OPPOSITE_DIRECTION: Record<Direction, Direction> = {
  up: "down",
  down: "up",
  left: "right",
  right: "left",
};

export function translate(pos: Position, direction: Direction): Position {
  const { dx, dy } = DIRECTION_TO_DELTA[direction];
  return { x: pos.x + dx, y: pos.y + dy };
}

export function inBounds(pos: Position, length: number): boolean {
  return (
    Number.isInteger(pos.x) &&
    Number.isInteger(pos.y) &&
    pos.x >= 0 &&
    pos.y >= 0 &&
    pos.x < length &&
    pos.y < length
  );
}

export function cellKey(pos: Position): string {
  return `${pos.x},${pos.y}`;
}
