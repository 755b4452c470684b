/* ------------------------------------------------- */
/* File: src/engine/combat.ts                        */
/* ------------------------------------------------- */
import { Battlefield } from "./battlefield.js";
import { StrikeReport } from "./types.js";

export function resolveIncomingShot(field: Battlefield, x: number, y: number): StrikeReport {
  const hit = field.strike(x, y);
  const sunk = hit && (field.shipAt(x, y)?.isSunk ?? false);
  return { hit, sunk, fleetDestroyed: field.isDefeated() };
}

export function applyShotResult(field: Battlefield, x: number, y: number, hit: boolean): void {
  field.recordShot(x, y, hit);
}
