/* ------------------------------------------------- */
/* File: src/engine/fleet.ts                         */
/* ------------------------------------------------- */
import { BattleshipError } from "../errors.js";
import { RandomSource, randomChoice, randomInt } from "../utils/random.js";
import { cellKey } from "./movement.js";
import { HULL_LENGTH, Ship, createShip } from "./ship.js";
import { ORIENTATIONS, ShipPlacement, ShipType } from "./types.js";

export const STANDARD_FLEET: readonly ShipType[] = [
  "Battleship",
  "Cruiser",
  "Destroyer",
  "Destroyer",
  "Submarine",
];

const MAX_ATTEMPTS_PER_SHIP = 200;

export function buildFleet(placements: readonly ShipPlacement[], length: number): Ship[] {
  return placements.map(p => createShip(p, length));
}

/** Placement aléatoire sans chevauchement ; ids 1..n dans l'ordre de la flotte. */
export function randomFleet(
  length: number,
  types: readonly ShipType[] = STANDARD_FLEET,
  random: RandomSource = Math.random,
): Ship[] {
  const taken = new Set<string>();
  const ships: Ship[] = [];

  types.forEach((type, i) => {
    const hull = HULL_LENGTH[type];
    if (hull > length) {
      throw BattleshipError.invalidPlacement(`${type} does not fit on a ${length}x${length} grid`, { type, length });
    }

    for (let attempt = 0; attempt < MAX_ATTEMPTS_PER_SHIP; attempt++) {
      const orientation = randomChoice(ORIENTATIONS, random);
      const span = length - hull + 1;
      const x = orientation === "horizontal" ? randomInt(span, random) : randomInt(length, random);
      const y = orientation === "horizontal" ? randomInt(length, random) : randomInt(span, random);
      const ship = createShip({ id: i + 1, type, x, y, orientation }, length);

      const cells = ship.occupiedCells().map(cellKey);
      if (cells.some(c => taken.has(c))) continue;

      cells.forEach(c => taken.add(c));
      ships.push(ship);
      return;
    }
    throw BattleshipError.invalidPlacement(`Could not place ${type} after ${MAX_ATTEMPTS_PER_SHIP} attempts`, { type });
  });

  return ships;
}
