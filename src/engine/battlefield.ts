/* ------------------------------------------------- */
/* File: src/engine/battlefield.ts                   */
/* ------------------------------------------------- */
import { BattleshipError } from "../errors.js";
import { cellKey, inBounds } from "./movement.js";
import { Ship } from "./ship.js";
import { CellState, Direction, Grid, Logger } from "./types.js";

function emptyGrid(length: number): Grid {
  return Array.from({ length }, () => new Array<CellState>(length).fill("hidden"));
}

/**
 * Flotte d'un joueur + deux grilles, indexées `[y][x]`.
 *
 * - `myBattlefield` : tirs adverses reçus
 * - `enemyBattlefield` : résultat de nos tirs
 */
export class Battlefield {
  private readonly _ships: Ship[];
  private readonly _myBattlefield: Grid;
  private readonly _enemyBattlefield: Grid;

  constructor(
    readonly length: number,
    ships: readonly Ship[],
    logger: Logger = console,
  ) {
    if (!Number.isInteger(length) || length <= 0) {
      throw BattleshipError.invalidPlacement(`Invalid battlefield length ${length}`, { length });
    }
    validateFleet(length, ships);

    this._ships = [...ships];
    this._myBattlefield = emptyGrid(length);
    this._enemyBattlefield = emptyGrid(length);

    logger.log(
      `[BATTLEFIELD] New battlefield ${length}x${length} with ships: ${ships.map(s => s.getShipType()).join(", ")}`,
    );
  }

  get ships(): readonly Ship[] {
    return this._ships;
  }

  get myBattlefield(): ReadonlyArray<ReadonlyArray<CellState>> {
    return this._myBattlefield;
  }

  get enemyBattlefield(): ReadonlyArray<ReadonlyArray<CellState>> {
    return this._enemyBattlefield;
  }

  /** Déplace d'une case ; id inconnu, sortie de grille ou collision -> false. */
  move(shipId: number, direction: Direction): boolean {
    const ship = this._ships.find(s => s.id === shipId);
    if (!ship) return false;

    const next = ship.cellsAfterMove(direction);
    if (!next) return false;

    const blocked = next.some(c => this._ships.some(other => other !== ship && other.occupies(c.x, c.y)));
    if (blocked) return false;

    return ship.move(direction);
  }

  /** tir adverse sur notre flotte */
  strike(x: number, y: number): boolean {
    if (!inBounds({ x, y }, this.length)) return false;

    for (const ship of this._ships) {
      if (ship.strikeAtPosition(x, y)) {
        this._myBattlefield[y][x] = "hit";
        return true;
      }
    }
    if (this._myBattlefield[y][x] === "hidden") {
      this._myBattlefield[y][x] = "miss";
    }
    return false;
  }

  /** tir possible : dans la grille et case encore inconnue */
  shoot(x: number, y: number): boolean {
    if (!inBounds({ x, y }, this.length)) return false;
    return this._enemyBattlefield[y][x] === "hidden";
  }

  recordShot(x: number, y: number, hit: boolean): void {
    if (!inBounds({ x, y }, this.length)) return;
    this._enemyBattlefield[y][x] = hit ? "hit" : "miss";
  }

  shipAt(x: number, y: number): Ship | undefined {
    return this._ships.find(s => s.occupies(x, y));
  }

  isDefeated(): boolean {
    return this._ships.length > 0 && this._ships.every(s => s.isSunk);
  }
}

function validateFleet(length: number, ships: readonly Ship[]): void {
  const ids = new Set<number>();
  const taken = new Map<string, number>();

  for (const ship of ships) {
    if (ids.has(ship.id)) {
      throw BattleshipError.invalidPlacement(`Duplicate ship id ${ship.id}`, { shipId: ship.id });
    }
    ids.add(ship.id);

    if (ship.fieldLength !== length) {
      throw BattleshipError.invalidPlacement(
        `Ship ${ship.id} was built for a ${ship.fieldLength}x${ship.fieldLength} grid`,
        { shipId: ship.id, fieldLength: ship.fieldLength, length },
      );
    }
    if (!ship.isWithinBounds()) {
      throw BattleshipError.invalidPlacement(`Ship ${ship.id} lies outside the grid`, {
        shipId: ship.id,
        position: ship.position,
      });
    }

    for (const cell of ship.occupiedCells()) {
      const key = cellKey(cell);
      const owner = taken.get(key);
      if (owner !== undefined) {
        throw BattleshipError.invalidPlacement(`Ships ${owner} and ${ship.id} overlap`, { at: key });
      }
      taken.set(key, ship.id);
    }
  }
}
